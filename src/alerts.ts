/**
 * Alert sink contract, the terminal implementation the watchdog child uses,
 * and the outage banner text.
 */

export type AlertCategory = "alert";

/**
 * Audible + visual notifier owned by the host program. Invoked only when a
 * suspected outage has been confirmed by a second, independent probe.
 */
export interface AlertSink {
  play(category: AlertCategory): void | Promise<void>;
  banner(message: string, diagCode: string): void | Promise<void>;
}

export interface OutageDetails {
  firstFailureTime: number;
  diagCode: string;
  probeId: string;
}

export function formatOutageBanner(outage: OutageDetails, now: number): string {
  const since = new Date(outage.firstFailureTime).toLocaleTimeString();
  const minutes = Math.floor((now - outage.firstFailureTime) / 60_000);
  const age = minutes >= 1 ? ` (${minutes} min)` : "";
  return [
    "No internet connection.",
    `Failing since ${since}${age}.`,
    "Open a web browser to check the connection.",
  ].join(" ");
}

/** Rings the terminal bell and prints a boxed banner to stderr. */
export class TerminalAlertSink implements AlertSink {
  private readonly out: NodeJS.WritableStream;

  constructor(out: NodeJS.WritableStream = process.stderr) {
    this.out = out;
  }

  play(_category: AlertCategory): void {
    this.out.write("\x07");
  }

  banner(message: string, diagCode: string): void {
    const text = `${message} [${diagCode}]`;
    const rule = "*".repeat(text.length + 4);
    this.out.write(`\n${rule}\n* ${text} *\n${rule}\n`);
  }
}
