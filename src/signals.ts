/**
 * Signal shim. Handlers only set flags; the monitor loop drains them between
 * sleep chunks, so no probe or file write is ever interrupted mid-way.
 */

export class SignalFlags {
  private reload = false;
  private shutdown = false;

  requestReload(): void {
    this.reload = true;
  }

  requestShutdown(): void {
    this.shutdown = true;
  }

  get shutdownRequested(): boolean {
    return this.shutdown;
  }

  /** Returns whether a reload was requested, clearing the request. */
  takeReload(): boolean {
    const requested = this.reload;
    this.reload = false;
    return requested;
  }
}

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * SIGUSR1 → reload, SIGTERM/SIGINT → shutdown. Returns an uninstaller.
 */
export function installSignalHandlers(
  flags: SignalFlags,
  target: SignalTarget = process,
): () => void {
  const onReload = () => flags.requestReload();
  const onShutdown = () => flags.requestShutdown();

  target.on("SIGUSR1", onReload);
  target.on("SIGTERM", onShutdown);
  target.on("SIGINT", onShutdown);

  return () => {
    target.off("SIGUSR1", onReload);
    target.off("SIGTERM", onShutdown);
    target.off("SIGINT", onShutdown);
  };
}
