import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by SIGINT. */
export const INTERRUPTED_EXIT_CODE = 130;

/** Where signal listeners are attached; the process outside tests. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Create a signal handler for interrupt signals.
 * Runs every callback once, then exits with status 130.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code),
  source: SignalSource = process
): SignalHandler {
  const handlers: Array<() => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = () => {
    if (isHandling) return;
    isHandling = true;
    void Promise.allSettled(handlers.map((h) => h())).then(() =>
      exit(INTERRUPTED_EXIT_CODE)
    );
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        source.on("SIGTERM", handleSignal);
        source.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      source.off("SIGTERM", handleSignal);
      source.off("SIGINT", handleSignal);
    },
  };
}
