/**
 * Strategies for choosing which probe of a category runs on a given tick.
 */

import type { Probe } from "./probes.js";

export interface ProbeSelector {
  /**
   * Pick one probe. `excludeId` is skipped when any other candidate remains,
   * so a suspected failure is not re-tested against the same endpoint.
   */
  pick(candidates: readonly Probe[], excludeId?: string): Probe;
}

function eligible(candidates: readonly Probe[], excludeId?: string): readonly Probe[] {
  if (candidates.length === 0) {
    throw new Error("No probes registered for this category");
  }
  if (excludeId === undefined) return candidates;
  const rest = candidates.filter((p) => p.id !== excludeId);
  return rest.length > 0 ? rest : candidates;
}

/** Spreads load and avoids correlated failure against one third party. */
export class RandomProbeSelector implements ProbeSelector {
  private readonly random: () => number;

  constructor(random: () => number = Math.random) {
    this.random = random;
  }

  pick(candidates: readonly Probe[], excludeId?: string): Probe {
    const pool = eligible(candidates, excludeId);
    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index];
  }
}

/** Deterministic rotation, one cursor per candidate set. */
export class RoundRobinProbeSelector implements ProbeSelector {
  private readonly cursors = new Map<string, number>();

  pick(candidates: readonly Probe[], excludeId?: string): Probe {
    const key = candidates.map((p) => p.id).join(",");
    let cursor = this.cursors.get(key) ?? 0;

    for (let i = 0; i < candidates.length; i++) {
      const probe = candidates[(cursor + i) % candidates.length];
      if (probe.id !== excludeId || candidates.length === 1) {
        cursor = (cursor + i + 1) % candidates.length;
        this.cursors.set(key, cursor);
        return probe;
      }
    }
    // Every candidate was the excluded one.
    return eligible(candidates, excludeId)[0];
  }
}
