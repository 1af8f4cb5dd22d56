import { invalidBudget } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Counting gate that bounds how many tasks run at once.
 * The owner acquires a slot before starting a task; the task releases it
 * when it finishes, whatever the outcome.
 */
export interface AdmissionGate {
  /** Maximum number of slots held at once */
  readonly capacity: number;
  /** Slots currently held */
  readonly inFlight: number;
  /** Callers waiting for a slot */
  readonly waiting: number;
  /** Highest number of slots held at any point */
  readonly peak: number;
  /** Wait for a free slot; rejects with the signal's reason on abort */
  acquire(signal?: AbortSignal): Promise<void>;
  /** Give a slot back, handing it to the oldest waiter if any */
  release(): void;
}

/** Builds a gate for a budget; lets callers swap the admission policy */
export type GateFactory = (capacity: number) => AdmissionGate;

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Sliding-window gate: a slot freed by any task is immediately reusable,
 * and waiters are served first-come first-served.
 * Throws CONFIG_INVALID_BUDGET unless capacity is a positive integer.
 */
export function createWindowGate(capacity: number): AdmissionGate {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw invalidBudget(capacity);
  }

  const waiters: Waiter[] = [];
  let inFlight = 0;
  let peak = 0;

  function take(): void {
    inFlight++;
    peak = Math.max(peak, inFlight);
  }

  function acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (inFlight < capacity) {
      take();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject,
      };
      const onAbort = () => {
        const index = waiters.indexOf(waiter);
        if (index !== -1) {
          waiters.splice(index, 1);
          reject(signal?.reason);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      waiters.push(waiter);
    });
  }

  function release(): void {
    if (inFlight === 0) {
      throw new Error("release() called without a held slot");
    }

    const next = waiters.shift();
    if (next) {
      // Slot moves directly to the waiter; inFlight is unchanged
      next.resolve();
      return;
    }
    inFlight--;
  }

  return {
    capacity,
    get inFlight() {
      return inFlight;
    },
    get waiting() {
      return waiters.length;
    },
    get peak() {
      return peak;
    },
    acquire,
    release,
  };
}
