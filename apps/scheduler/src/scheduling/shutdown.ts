/**
 * Turns SIGINT/SIGTERM/SIGQUIT into a flag the polling loop checks between
 * passes. Signals never interrupt a drain in progress.
 */
import type { Logger } from "../lib/logger.js";

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGTERM",
  "SIGINT",
  "SIGQUIT",
];

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/** The host's signal facility, or null when the runtime has none. */
export function detectSignalSource(): SignalSource | null {
  if (typeof process === "undefined" || typeof process.on !== "function") {
    return null;
  }
  return {
    on: (signal, listener) => process.on(signal, listener),
    off: (signal, listener) => process.off(signal, listener),
  };
}

export class ShutdownCoordinator {
  private requested = false;
  private registered = false;
  private unsupportedReported = false;
  private readonly listener = () => this.request();

  constructor(
    private readonly logger: Logger,
    private readonly signals: SignalSource | null,
  ) {}

  get shutdownRequested(): boolean {
    return this.requested;
  }

  get signalsSupported(): boolean {
    return this.signals !== null;
  }

  /** Set the flag. Only the first call logs; later calls are no-ops. */
  request(): void {
    if (this.requested) return;
    this.requested = true;
    this.logger.log("notice", "Shutting down");
  }

  register(): void {
    if (this.registered) return;
    this.registered = true;
    if (!this.signals) {
      if (this.unsupportedReported) return;
      this.unsupportedReported = true;
      this.logger.log(
        "warning",
        "Signal handling unavailable; worker can only be stopped externally",
      );
      return;
    }
    for (const signal of SHUTDOWN_SIGNALS) {
      this.signals.on(signal, this.listener);
    }
    this.logger.log("debug", "Registered signals");
  }

  unregister(): void {
    if (!this.registered) return;
    this.registered = false;
    if (!this.signals) return;
    for (const signal of SHUTDOWN_SIGNALS) {
      this.signals.off(signal, this.listener);
    }
  }
}
