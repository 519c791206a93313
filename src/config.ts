/**
 * Watchdog configuration types, defaults and validation.
 */

import { existsSync, readFileSync } from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const WatchdogConfigSchema = Type.Object({
  /** Minutes between primary probes. 0 disables the whole subsystem. */
  checkFrequencyMinutes: Type.Number({ minimum: 0 }),
  /** How long a primary failure must persist before a confirmation probe runs. */
  confirmationDelaySeconds: Type.Number({ minimum: 0 }),
  /** Folder for the heartbeat CSV. Empty string disables heartbeat logging. */
  heartbeatFolder: Type.String(),
  probeTimeoutMs: Type.Integer({ minimum: 1 }),
  /** Upper bound on a single sleep chunk; reload/shutdown latency. */
  minimumSleepMs: Type.Integer({ minimum: 1 }),
  supportedPlatforms: Type.Array(Type.String()),
  defaultSuppressMinutes: Type.Number({ minimum: 0 }),
});

export type WatchdogConfig = Static<typeof WatchdogConfigSchema>;

export const DEFAULT_CONFIG: WatchdogConfig = {
  checkFrequencyMinutes: 10,
  confirmationDelaySeconds: 30,
  heartbeatFolder: "",
  probeTimeoutMs: 10_000,
  minimumSleepMs: 1_000,
  supportedPlatforms: ["linux", "darwin"],
  defaultSuppressMinutes: 120,
};

export class WatchdogConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WatchdogConfigError";
  }
}

/**
 * Merge partial settings over the defaults and validate the result.
 * Throws WatchdogConfigError naming the first offending field.
 */
export function resolveConfig(partial: Partial<WatchdogConfig> = {}): WatchdogConfig {
  const merged: unknown = { ...DEFAULT_CONFIG, ...partial };
  if (!Value.Check(WatchdogConfigSchema, merged)) {
    const first = Value.Errors(WatchdogConfigSchema, merged).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "invalid value";
    throw new WatchdogConfigError(`Invalid watchdog config at ${where}`);
  }
  return merged;
}

/**
 * Load config from the `netwatch` section of a JSON file (if present), with
 * explicit overrides applied on top.
 */
export function loadConfig(
  path?: string,
  overrides: Partial<WatchdogConfig> = {},
): WatchdogConfig {
  let fileConfig: Partial<WatchdogConfig> = {};
  if (path && existsSync(path)) {
    try {
      const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
      fileConfig = pickSection(raw);
    } catch (err) {
      console.warn(`[netwatch] Ignoring unreadable config file ${path}: ${String(err)}`);
    }
  }
  return resolveConfig({ ...fileConfig, ...overrides });
}

function pickSection(raw: unknown): Partial<WatchdogConfig> {
  if (typeof raw !== "object" || raw === null || !("netwatch" in raw)) return {};
  const section = raw.netwatch;
  if (typeof section !== "object" || section === null) return {};
  const partial = Type.Partial(WatchdogConfigSchema);
  return Value.Check(partial, section) ? section : {};
}

export function checkIntervalMs(config: WatchdogConfig): number {
  return config.checkFrequencyMinutes * 60_000;
}

export function confirmationDelayMs(config: WatchdogConfig): number {
  return config.confirmationDelaySeconds * 1_000;
}

/** Cooldown between two notifications of the same outage. */
export function cooldownMs(config: WatchdogConfig): number {
  return Math.max(checkIntervalMs(config), confirmationDelayMs(config));
}

export function isSupportedPlatform(
  config: WatchdogConfig,
  platform: string = process.platform,
): boolean {
  return config.supportedPlatforms.includes(platform);
}
