import type { SignalHandler } from "../ports/signal-handler.js";

/** Anything that emits process signals; the process itself in production */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Create a signal handler for process shutdown signals.
 * The first SIGINT/SIGTERM runs the callbacks so the run can wind down;
 * a second one exits immediately with 130.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code),
  source: SignalSource = process
): SignalHandler {
  const handlers: Array<() => void> = [];
  let signalled = false;

  const handleSignal = () => {
    if (signalled) {
      exit(130);
      return;
    }
    signalled = true;
    for (const handler of handlers) {
      handler();
    }
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
