/**
 * Abstraction for process signal handling.
 * Allows testing interruption without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for interrupt signals (SIGINT, SIGTERM) */
  onShutdown(callback: () => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
