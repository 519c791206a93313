/**
 * One-shot connectivity check: a single primary probe, no confirmation, no
 * scheduling. For scripts and for asking "am I online right now?".
 */

import type { ProbeRegistry, ProbeResult } from "./probes.js";
import { RandomProbeSelector, type ProbeSelector } from "./probe-selector.js";

export async function checkOnce(
  registry: ProbeRegistry,
  selector: ProbeSelector = new RandomProbeSelector(),
): Promise<ProbeResult> {
  return selector.pick(registry.primary()).run();
}

export function formatCheckResult(result: ProbeResult): string {
  return result.ok ? "Yes Internet" : `No Internet [${result.diagnostic}]`;
}
