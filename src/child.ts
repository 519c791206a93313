/**
 * Watchdog child entry point. Spawned by WatchdogSupervisor; runs the monitor
 * loop until SIGTERM/SIGINT or until the parent process disappears.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { WatchdogConfigSchema } from "./config.js";
import { ControlChannel } from "./control-channel.js";
import { HeartbeatLog } from "./heartbeat.js";
import { MonitorLoop } from "./monitor-loop.js";
import { defaultRegistry } from "./probes.js";
import { installSignalHandlers, SignalFlags } from "./signals.js";
import { TerminalAlertSink } from "./alerts.js";
import { CHILD_ENV_VAR, type ChildOptions } from "./supervisor.js";

// Handlers go in first: without a listener, SIGUSR1 would open the inspector.
const signals = new SignalFlags();
installSignalHandlers(signals);

const ChildOptionsSchema = Type.Object({
  controlPath: Type.String({ minLength: 1 }),
  parentPid: Type.Integer({ minimum: 1 }),
  config: WatchdogConfigSchema,
});

function parseChildOptions(raw: string | undefined): ChildOptions | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return Value.Check(ChildOptionsSchema, parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function main(): Promise<number> {
  const opts = parseChildOptions(process.env[CHILD_ENV_VAR]);
  if (!opts) {
    console.error(`[netwatch] Missing or invalid ${CHILD_ENV_VAR}; this script is started by the supervisor.`);
    return 2;
  }
  if (!opts.config.checkFrequencyMinutes) return 0;

  let loop: MonitorLoop | null = null;
  const channel = new ControlChannel(opts.controlPath, {
    onError: (message) => loop?.reportControlError(message),
  });

  loop = new MonitorLoop({
    config: opts.config,
    registry: defaultRegistry(opts.config.probeTimeoutMs),
    channel,
    heartbeat: new HeartbeatLog(opts.config.heartbeatFolder),
    alertSink: new TerminalAlertSink(),
    signals,
    parentAlive: () => isAlive(opts.parentPid),
  });

  await loop.run();
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error("[netwatch] Watchdog crashed:", err);
    process.exit(1);
  },
);
