/**
 * MonitorLoop — the watchdog's single-threaded scheduler.
 *
 * Every tick runs at most one probe. A failing primary probe opens a pending
 * alert; if no primary probe succeeds before the confirmation delay elapses, a
 * confirmation probe against an independent resolver decides whether the
 * outage is real. A confirmed outage notifies the alert sink (unless the
 * operator suppressed it) and then stays quiet for one cooldown window.
 *
 *   startup → steady ⇄ pending → { steady, alerted } → steady
 */

import {
  checkIntervalMs,
  confirmationDelayMs,
  cooldownMs,
  type WatchdogConfig,
} from "./config.js";
import type { ControlChannel, ControlState } from "./control-channel.js";
import type { Probe, ProbeCategory, ProbeRegistry, ProbeResult } from "./probes.js";
import { RandomProbeSelector, type ProbeSelector } from "./probe-selector.js";
import type { HeartbeatLog, HeartbeatType } from "./heartbeat.js";
import { formatOutageBanner, type AlertSink } from "./alerts.js";
import { formatDiagnostic } from "./diagnostics.js";
import { SignalFlags } from "./signals.js";

export type MonitorPhase = "startup" | "steady" | "pending" | "alerted";

export interface PendingAlert {
  firstFailureTime: number;
  diagCode: string;
  probeId: string;
  /** When the confirmed outage was (or would have been) announced. */
  notifiedAt: number | null;
}

export interface LoopClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: LoopClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type WakeReason = "due" | "reload" | "shutdown";

export interface MonitorLoopOptions {
  config: WatchdogConfig;
  registry: ProbeRegistry;
  channel: ControlChannel;
  heartbeat: HeartbeatLog;
  alertSink: AlertSink;
  selector?: ProbeSelector;
  signals?: SignalFlags;
  clock?: LoopClock;
  /** Returns false once the parent process is gone; the loop then exits. */
  parentAlive?: () => boolean;
}

export interface MonitorStatus {
  phase: MonitorPhase;
  pending: PendingAlert | null;
  alertsEmitted: number;
  suppressedUntil: number;
  debug: boolean;
  nextWakeAt: number;
}

const NO_CONTROL: ControlState = {
  suppressUntil: 0,
  commandToken: "",
  debug: false,
  writtenAt: 0,
};

export class MonitorLoop {
  private readonly intervalMs: number;
  private readonly delayMs: number;
  private readonly cooldownMs: number;
  private readonly minimumSleepMs: number;
  private readonly registry: ProbeRegistry;
  private readonly channel: ControlChannel;
  private readonly heartbeat: HeartbeatLog;
  private readonly alertSink: AlertSink;
  private readonly selector: ProbeSelector;
  private readonly signals: SignalFlags;
  private readonly clock: LoopClock;
  private readonly parentAlive: () => boolean;

  private phase: MonitorPhase = "startup";
  private pending: PendingAlert | null = null;
  private control: ControlState = NO_CONTROL;
  private nextPrimaryAt = 0;
  /** Last failed probe per category, skipped on that category's next pick. */
  private readonly lastFailed: Partial<Record<ProbeCategory, string>> = {};
  private alertsEmitted = 0;

  constructor(opts: MonitorLoopOptions) {
    this.intervalMs = checkIntervalMs(opts.config);
    this.delayMs = confirmationDelayMs(opts.config);
    this.cooldownMs = cooldownMs(opts.config);
    this.minimumSleepMs = opts.config.minimumSleepMs;
    this.registry = opts.registry;
    this.channel = opts.channel;
    this.heartbeat = opts.heartbeat;
    this.alertSink = opts.alertSink;
    this.selector = opts.selector ?? new RandomProbeSelector();
    this.signals = opts.signals ?? new SignalFlags();
    this.clock = opts.clock ?? systemClock;
    this.parentAlive = opts.parentAlive ?? (() => true);
  }

  /**
   * Run until shutdown is requested or the parent disappears. Never rejects
   * because of a probe or sink error.
   */
  async run(): Promise<void> {
    this.begin();
    await this.heartbeat.append("LOOP", "SYS", "STARTED");
    console.log(
      `[netwatch] Watchdog started: primary check every ${this.intervalMs / 1000}s, ` +
        `confirmation after ${this.delayMs / 1000}s`,
    );

    while (true) {
      const reason = await this.sleepUntil(this.nextWakeAt());
      if (reason === "shutdown") break;
      if (reason === "reload") continue;
      try {
        await this.tick();
      } catch (err) {
        console.error("[netwatch] Tick failed:", err);
      }
    }

    await this.heartbeat.append("LOOP", "SYS", "STOPPED");
    console.log("[netwatch] Watchdog stopped");
  }

  /** Load control state and schedule the first probe one interval out. */
  begin(): void {
    this.phase = "startup";
    this.pending = null;
    this.reloadControl();
    this.nextPrimaryAt = this.clock.now() + this.intervalMs;
    this.debug(`startup grace until ${new Date(this.nextPrimaryAt).toISOString()}`);
  }

  /** Earliest time anything is due. */
  nextWakeAt(): number {
    const confirmAt = this.confirmationDueAt();
    return confirmAt === null ? this.nextPrimaryAt : Math.min(this.nextPrimaryAt, confirmAt);
  }

  /**
   * Sleep in chunks no longer than minimumSleepMs, returning early on shutdown
   * or when a control reload changed the state.
   */
  async sleepUntil(target: number): Promise<WakeReason> {
    while (true) {
      if (this.signals.shutdownRequested) return "shutdown";
      if (!this.parentAlive()) {
        console.log("[netwatch] Parent process is gone, shutting down");
        this.signals.requestShutdown();
        return "shutdown";
      }
      const signalled = this.signals.takeReload();
      if (this.reloadControl() || signalled) {
        if (signalled) this.debug("reload requested by signal");
        return "reload";
      }

      const remaining = target - this.clock.now();
      if (remaining <= 0) return "due";
      await this.clock.sleep(Math.min(remaining, this.minimumSleepMs));
    }
  }

  /** One scheduling step at the current clock time. */
  async tick(): Promise<void> {
    const now = this.clock.now();
    if (this.phase === "startup") {
      this.phase = "steady";
      this.debug("startup grace elapsed");
    }

    const confirmAt = this.confirmationDueAt();
    if (confirmAt !== null && now >= confirmAt) {
      await this.runConfirmation(now);
      return;
    }
    if (now >= this.nextPrimaryAt) {
      this.nextPrimaryAt = now + this.intervalMs;
      await this.runPrimary(now);
      return;
    }
    this.debug("woke with nothing due");
  }

  /**
   * Re-read the control file; apply it only if the command token changed.
   * Returns whether the state changed.
   */
  reloadControl(): boolean {
    const next = this.channel.read() ?? NO_CONTROL;
    if (next.commandToken === this.control.commandToken) return false;

    this.control = next;
    if (this.isSuppressed(this.clock.now())) {
      console.log(
        `[netwatch] Alerts suppressed until ${new Date(next.suppressUntil).toLocaleTimeString()}`,
      );
    } else {
      this.debug("control reloaded, alerts active");
    }
    this.debug(`debug=${next.debug} token=${next.commandToken || "(none)"}`);
    return true;
  }

  /** Hook for ControlChannel read errors; only visible under debug. */
  reportControlError(message: string): void {
    this.debug(message);
  }

  isSuppressed(now: number): boolean {
    return now < this.control.suppressUntil;
  }

  status(): MonitorStatus {
    return {
      phase: this.phase,
      pending: this.pending ? { ...this.pending } : null,
      alertsEmitted: this.alertsEmitted,
      suppressedUntil: this.control.suppressUntil,
      debug: this.control.debug,
      nextWakeAt: this.nextWakeAt(),
    };
  }

  private confirmationDueAt(): number | null {
    if (!this.pending) return null;
    if (this.pending.notifiedAt === null) return this.pending.firstFailureTime + this.delayMs;
    return this.pending.notifiedAt + this.cooldownMs;
  }

  private async runPrimary(now: number): Promise<void> {
    const probe = this.selector.pick(this.registry.primary(), this.lastFailed.primary);
    const result = await this.execute(probe, "P");

    if (result.ok) {
      delete this.lastFailed.primary;
      if (this.pending) {
        console.log(`[netwatch] Connection restored (${probe.id} ok)`);
        this.clearPending();
      }
      return;
    }

    this.lastFailed.primary = probe.id;
    if (!this.pending) {
      this.pending = {
        firstFailureTime: now,
        diagCode: result.diagnostic,
        probeId: probe.id,
        notifiedAt: null,
      };
      this.phase = "pending";
      console.log(
        `[netwatch] Possible outage (${result.diagnostic}), confirming in ${this.delayMs / 1000}s`,
      );
      return;
    }

    // Still failing. The outage start and notification time stay anchored.
    this.pending.diagCode = result.diagnostic;
    this.pending.probeId = probe.id;
    this.debug(`still failing: ${result.diagnostic}`);
  }

  private async runConfirmation(now: number): Promise<void> {
    const pending = this.pending;
    if (!pending) return;

    const probe = this.selector.pick(this.registry.confirmation(), this.lastFailed.confirmation);
    const result = await this.execute(probe, "C");

    if (result.ok) {
      delete this.lastFailed.confirmation;
      console.log(
        `[netwatch] ${probe.id} confirmation passed, ${pending.diagCode} was not an outage`,
      );
      this.clearPending();
      return;
    }

    this.lastFailed.confirmation = probe.id;
    pending.diagCode = result.diagnostic;
    pending.notifiedAt = now;
    this.phase = "alerted";

    if (this.isSuppressed(now)) {
      console.log(
        `[netwatch] Outage confirmed (${result.diagnostic}) while suppressed, not alerting`,
      );
      return;
    }

    console.warn(`[netwatch] Outage confirmed (${result.diagnostic})`);
    this.alertsEmitted++;
    await this.notify(formatOutageBanner(pending, now), result.diagnostic);
  }

  private async notify(message: string, diagCode: string): Promise<void> {
    try {
      await this.alertSink.play("alert");
    } catch (err) {
      console.error("[netwatch] Alert sound failed:", err);
    }
    try {
      await this.alertSink.banner(message, diagCode);
    } catch (err) {
      console.error("[netwatch] Alert banner failed:", err);
    }
  }

  private async execute(probe: Probe, type: HeartbeatType): Promise<ProbeResult> {
    let result: ProbeResult;
    try {
      result = await probe.run();
    } catch (err) {
      // Registered probes should not throw; treat it like any other failure.
      console.error(`[netwatch] Probe ${probe.id} threw:`, err);
      result = { ok: false, diagnostic: formatDiagnostic(probe.id, "unknown") };
    }
    const status = result.ok ? "OK" : result.diagnostic;
    this.debug(`${type} ${probe.id} (${probe.name}): ${status}`);
    await this.heartbeat.append(probe.id, type, status);
    return result;
  }

  private clearPending(): void {
    this.pending = null;
    this.phase = "steady";
  }

  private debug(message: string): void {
    if (this.control.debug) {
      console.log(`[netwatch] debug: ${message}`);
    }
  }
}
