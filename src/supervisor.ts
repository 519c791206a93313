/**
 * WatchdogSupervisor — the parent-side API. Owns the watchdog child process and
 * is the only writer of its control file.
 *
 * Nothing here throws into the host program: an unsupported platform, a zero
 * check frequency, or a failed spawn all leave the host running without
 * connectivity monitoring.
 */

import { spawn } from "node:child_process";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { isSupportedPlatform, type WatchdogConfig } from "./config.js";
import { ControlChannel, controlFilePath, errorMessage } from "./control-channel.js";
import { HeartbeatLog } from "./heartbeat.js";

export const CHILD_ENV_VAR = "NETWATCH_CHILD";

/** What the child is told about its job, passed through CHILD_ENV_VAR. */
export interface ChildOptions {
  controlPath: string;
  parentPid: number;
  config: WatchdogConfig;
}

/** The part of a ChildProcess the supervisor relies on. */
export interface WatchdogChild {
  readonly pid?: number;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnChild = (script: string, env: NodeJS.ProcessEnv) => WatchdogChild;

/** Child entry beside this module: child.ts under tsx, child.js once built. */
export function childScriptPath(): string {
  const here = fileURLToPath(import.meta.url);
  return fileURLToPath(new URL(`./child${extname(here)}`, import.meta.url));
}

const spawnNode: SpawnChild = (script, env) =>
  spawn(process.execPath, [...process.execArgv, script], {
    env,
    stdio: ["ignore", "inherit", "inherit"],
  });

export interface SupervisorOptions {
  config: WatchdogConfig;
  parentPid?: number;
  platform?: string;
  spawnChild?: SpawnChild;
  now?: () => number;
  /** Directory for the control file; the OS temp dir by default. */
  controlDir?: string;
  heartbeat?: HeartbeatLog;
  /** Whether to hook process exit to terminate the child. */
  registerExitHook?: boolean;
}

export class WatchdogSupervisor {
  private readonly config: WatchdogConfig;
  private readonly parentPid: number;
  private readonly platform: string;
  private readonly spawnChild: SpawnChild;
  private readonly now: () => number;
  private readonly channel: ControlChannel;
  private readonly heartbeat: HeartbeatLog;
  private readonly registerExitHook: boolean;

  private child: WatchdogChild | null = null;
  private suppressUntil = 0;
  private debug = false;
  private exitHookInstalled = false;
  private readonly warned = new Set<string>();
  private enabled = false;
  private lastToken: string | null = null;

  constructor(opts: SupervisorOptions) {
    this.config = opts.config;
    this.parentPid = opts.parentPid ?? process.pid;
    this.platform = opts.platform ?? process.platform;
    this.spawnChild = opts.spawnChild ?? spawnNode;
    this.now = opts.now ?? Date.now;
    this.channel = new ControlChannel(controlFilePath(this.parentPid, opts.controlDir), {
      now: this.now,
    });
    this.heartbeat = opts.heartbeat ?? new HeartbeatLog(this.config.heartbeatFolder, this.now);
    this.registerExitHook = opts.registerExitHook ?? true;
  }

  get controlPath(): string {
    return this.channel.path;
  }

  get running(): boolean {
    return this.child !== null && this.child.exitCode === null;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get childPid(): number | undefined {
    return this.child?.pid;
  }

  /** Monitoring disabled by config, or a platform without the signals we need. */
  okToStart(): boolean {
    if (!this.config.checkFrequencyMinutes) return false;
    if (!isSupportedPlatform(this.config, this.platform)) {
      this.warnOnce(
        "platform",
        `Internet monitoring is not supported on ${this.platform}, not starting it.`,
      );
      return false;
    }
    return true;
  }

  /**
   * Write the initial control state and launch the watchdog child.
   * Returns whether a child is running afterwards.
   */
  startMonitor(initialSuppressSeconds = 0): boolean {
    if (!this.okToStart()) return false;
    if (this.running) return true;

    if (initialSuppressSeconds > 0) {
      this.suppressUntil = this.now() + initialSuppressSeconds * 1000;
    }
    try {
      this.writeControl();
    } catch (err) {
      this.warnOnce("control", `Could not write watchdog control file: ${errorMessage(err)}`);
      return false;
    }

    const childOptions: ChildOptions = {
      controlPath: this.channel.path,
      parentPid: this.parentPid,
      config: this.config,
    };
    let child: WatchdogChild;
    try {
      child = this.spawnChild(childScriptPath(), {
        ...process.env,
        [CHILD_ENV_VAR]: JSON.stringify(childOptions),
      });
    } catch (err) {
      this.warnOnce("spawn", `Could not start internet monitor: ${errorMessage(err)}`);
      return false;
    }

    this.child = child;
    this.enabled = true;
    child.once("error", (err) => {
      this.warnOnce("spawn", `Internet monitor process error: ${err.message}`);
      if (this.child === child) this.child = null;
    });
    child.once("exit", (code, signal) => {
      if (this.child !== child) return;
      this.child = null;
      this.warnOnce(
        "exit",
        `Internet monitor exited unexpectedly (${signal ?? `code ${code ?? "?"}`}).`,
      );
    });

    console.log(
      `[netwatch] Checking internet connection every ${this.config.checkFrequencyMinutes} minutes.`,
    );
    this.installExitHook();
    return true;
  }

  /**
   * Turn monitoring on (if it was off). Returns false, and records nothing,
   * when the monitor declined to start.
   */
  async enable(): Promise<boolean> {
    const started = this.startMonitor();
    this.enabled = started;
    if (!started) return false;
    await this.heartbeat.append("CTRL", "SYS", "ENABLED");
    return true;
  }

  /** Turn monitoring off (if it was on). */
  async disable(): Promise<void> {
    this.stop();
    this.enabled = false;
    await this.heartbeat.append("CTRL", "SYS", "DISABLED");
  }

  /** Suppress alerts for the given number of minutes. Returns the command token. */
  monitorOff(minutes: number = this.config.defaultSuppressMinutes): string | null {
    this.suppressUntil = this.now() + minutes * 60_000;
    return this.push();
  }

  /** Resume alerting immediately. */
  monitorOn(): string | null {
    this.suppressUntil = this.now() - 1000;
    return this.push();
  }

  /** Change the child's debug flag, leaving the suppression window alone. */
  setDebug(enabled: boolean): string | null {
    this.debug = enabled;
    return this.push();
  }

  /** Terminate the child and remove the control file. */
  stop(): void {
    const child = this.child;
    this.child = null;
    if (child && child.exitCode === null) {
      child.kill("SIGTERM");
      console.log("[netwatch] Internet monitor stopped");
    }
    this.channel.remove();
  }

  private push(): string | null {
    if (!this.running) {
      // startMonitor writes the current state before spawning.
      return this.startMonitor() ? this.lastToken : null;
    }
    let token: string;
    try {
      token = this.writeControl();
    } catch (err) {
      this.warnOnce("control", `Could not write watchdog control file: ${errorMessage(err)}`);
      return null;
    }
    ControlChannel.signal(this.child?.pid);
    return token;
  }

  private writeControl(): string {
    this.lastToken = this.channel.write({ suppressUntil: this.suppressUntil, debug: this.debug });
    return this.lastToken;
  }

  private installExitHook(): void {
    if (!this.registerExitHook || this.exitHookInstalled) return;
    this.exitHookInstalled = true;
    process.once("exit", () => this.stop());
  }

  private warnOnce(key: string, message: string): void {
    if (this.warned.has(key)) return;
    this.warned.add(key);
    console.warn(`[netwatch] ${message}`);
  }
}
