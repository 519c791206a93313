/**
 * Control channel — the on-disk JSON document the parent uses to steer the
 * watchdog child (suppression window, debug flag).
 *
 * One writer (the supervisor), one reader (the monitor loop). Writes go to a
 * temp file in the same directory and are renamed over the target, so a reader
 * sees either the previous document or the new one, never a partial write.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Wire format of the control file (epoch seconds, snake_case keys). */
export const ControlDocumentSchema = Type.Object({
  suppress_until: Type.Number(),
  command_token: Type.String({ minLength: 1 }),
  debug: Type.Boolean(),
  written_at: Type.Number(),
});

export type ControlDocument = Static<typeof ControlDocumentSchema>;

export interface ControlState {
  /** Epoch ms before which confirmed outages are not surfaced. */
  suppressUntil: number;
  commandToken: string;
  debug: boolean;
  writtenAt: number;
}

export interface ControlUpdate {
  suppressUntil: number;
  debug: boolean;
}

export interface ControlChannelOptions {
  /** Called with a description of any read failure. */
  onError?: (message: string) => void;
  now?: () => number;
}

export function controlFilePath(parentPid: number, dir: string = tmpdir()): string {
  return join(dir, `netwatch-control-${parentPid}.json`);
}

export class ControlChannel {
  private readonly filePath: string;
  private readonly onError: (message: string) => void;
  private readonly now: () => number;
  private lastGood: ControlState | null = null;

  constructor(filePath: string, opts: ControlChannelOptions = {}) {
    this.filePath = filePath;
    this.onError = opts.onError ?? (() => {});
    this.now = opts.now ?? Date.now;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Atomically replace the control file. Returns the new command token.
   */
  write(update: ControlUpdate): string {
    const token = randomUUID();
    const doc: ControlDocument = {
      suppress_until: update.suppressUntil / 1000,
      command_token: token,
      debug: update.debug,
      written_at: this.now() / 1000,
    };

    const tmp = `${this.filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      const fd = openSync(tmp, "w", 0o600);
      try {
        writeSync(fd, JSON.stringify(doc) + "\n");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmp, this.filePath);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
    return token;
  }

  /**
   * Read the current state. Missing file ⇒ null. A corrupt or unreadable file
   * leaves the previously read state in effect.
   */
  read(): ControlState | null {
    if (!existsSync(this.filePath)) {
      this.lastGood = null;
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch (err) {
      this.onError(`control file unreadable (${errorMessage(err)}), keeping previous state`);
      return this.lastGood;
    }

    if (!Value.Check(ControlDocumentSchema, raw)) {
      this.onError("control file does not match the expected shape, keeping previous state");
      return this.lastGood;
    }

    this.lastGood = {
      suppressUntil: raw.suppress_until * 1000,
      commandToken: raw.command_token,
      debug: raw.debug,
      writtenAt: raw.written_at * 1000,
    };
    return this.lastGood;
  }

  /**
   * Ask the watchdog to reload now. Best effort: the watchdog re-reads the file
   * on its own within one sleep chunk anyway.
   */
  static signal(pid: number | undefined): boolean {
    if (pid === undefined || pid <= 0) return false;
    try {
      return process.kill(pid, "SIGUSR1");
    } catch {
      return false;
    }
  }

  remove(): void {
    rmSync(this.filePath, { force: true });
    this.lastGood = null;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
