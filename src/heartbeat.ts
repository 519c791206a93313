/**
 * Heartbeat log — append-only CSV, one line per probe execution.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";

export type HeartbeatType = "P" | "C" | "SYS";

export const HEARTBEAT_FILE = "netwatch-heartbeat.csv";
export const HEARTBEAT_HEADER = "date,time,probe_id,probe_type,status";

export interface HeartbeatRecord {
  date: string;
  time: string;
  probeId: string;
  probeType: HeartbeatType;
  /** "OK", a diagnostic code, or a SYS event name. */
  status: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function toHeartbeatRecord(
  at: Date,
  probeId: string,
  probeType: HeartbeatType,
  status: string,
): HeartbeatRecord {
  return {
    date: `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`,
    time: `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`,
    probeId,
    probeType,
    status,
  };
}

export function formatHeartbeatLine(rec: HeartbeatRecord): string {
  return [rec.date, rec.time, rec.probeId, rec.probeType, rec.status].join(",");
}

export class HeartbeatLog {
  private readonly filePath: string | null;
  private readonly now: () => number;

  /** An empty folder disables logging. */
  constructor(folder: string, now: () => number = Date.now) {
    this.filePath = folder ? join(folder, HEARTBEAT_FILE) : null;
    this.now = now;
  }

  get enabled(): boolean {
    return this.filePath !== null;
  }

  get path(): string | null {
    return this.filePath;
  }

  /**
   * Append one record. Failures are logged, not thrown: a full disk must not
   * take the watchdog down.
   */
  async append(probeId: string, probeType: HeartbeatType, status: string): Promise<void> {
    if (!this.filePath) return;
    const line = formatHeartbeatLine(
      toHeartbeatRecord(new Date(this.now()), probeId, probeType, status),
    );

    try {
      const prefix = existsSync(this.filePath) ? "" : HEARTBEAT_HEADER + "\n";
      if (prefix) {
        await mkdir(dirname(this.filePath), { recursive: true });
      }
      await appendFile(this.filePath, prefix + line + "\n");
    } catch (err) {
      console.error("[netwatch] Failed to append heartbeat:", err);
    }
  }
}
