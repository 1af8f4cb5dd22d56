/**
 * Shutdown signal hooks, so run cancellation can be tested without real signals.
 */
export interface SignalHandler {
  /** Called on the first SIGINT or SIGTERM */
  onShutdown(callback: () => void): void;
  /** Forget every callback and stop listening */
  removeAll(): void;
}
