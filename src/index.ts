/**
 * netwatch — internet connectivity watchdog for an interactive session.
 *
 * Architecture:
 *   WatchdogSupervisor (parent) → control file + SIGUSR1 → child → MonitorLoop
 *     → primary probe → (pending) → confirmation probe → AlertSink
 *
 *   The parent only ever writes the control file; the child only ever reads
 *   it. Every probe execution lands in the append-only heartbeat CSV.
 *
 * Usage from the host program:
 *
 *   const watchdog = new WatchdogSupervisor({ config: loadConfig() });
 *   watchdog.startMonitor();
 *   watchdog.monitorOff(120); // quiet for two hours
 *   watchdog.monitorOn();
 *
 * A single check without the watchdog:
 *
 *   const result = await checkOnce(defaultRegistry(10_000));
 *   console.log(formatCheckResult(result)); // "Yes Internet"
 */

export {
  DEFAULT_CONFIG,
  WatchdogConfigError,
  WatchdogConfigSchema,
  loadConfig,
  resolveConfig,
  type WatchdogConfig,
} from "./config.js";
export {
  ControlChannel,
  controlFilePath,
  type ControlState,
  type ControlUpdate,
} from "./control-channel.js";
export { classifyFailure, formatDiagnostic, type FailureCategory } from "./diagnostics.js";
export {
  ProbeRegistry,
  createDohProbe,
  createHttpProbe,
  defaultRegistry,
  type Probe,
  type ProbeResult,
  type ProbeTransport,
} from "./probes.js";
export { checkOnce, formatCheckResult } from "./check-once.js";
export {
  RandomProbeSelector,
  RoundRobinProbeSelector,
  type ProbeSelector,
} from "./probe-selector.js";
export { HeartbeatLog, type HeartbeatRecord, type HeartbeatType } from "./heartbeat.js";
export { TerminalAlertSink, formatOutageBanner, type AlertSink } from "./alerts.js";
export { SignalFlags, installSignalHandlers } from "./signals.js";
export {
  MonitorLoop,
  systemClock,
  type LoopClock,
  type MonitorPhase,
  type MonitorStatus,
  type PendingAlert,
} from "./monitor-loop.js";
export { WatchdogSupervisor, type SupervisorOptions } from "./supervisor.js";
