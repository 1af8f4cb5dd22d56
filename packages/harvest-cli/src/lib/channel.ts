/**
 * Async channel for passing values between tasks, with optional buffering.
 *
 * - capacity 0 is a rendezvous: `send` settles only once a receiver took the value
 * - capacity n buffers up to n values before `send` starts waiting
 * - capacity Infinity never makes a sender wait
 *
 * Closing wakes every waiting receiver with `done`; values already buffered are
 * still delivered first. Sending on a closed channel rejects.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ReceiveResult<T> =
  | { done: false; value: T }
  | { done: true; value: undefined };

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (reason: unknown) => void;
}

interface PendingReceive<T> {
  resolve: (result: ReceiveResult<T>) => void;
  reject: (reason: unknown) => void;
}

export class ChannelClosedError extends Error {
  constructor(message = "Channel is closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

const DONE = { done: true, value: undefined } as const;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class Channel<T> implements AsyncIterable<T> {
  readonly capacity: number;

  // Values are boxed so that T may itself include undefined
  private readonly buffer: Array<{ value: T }> = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(capacity = 0) {
    if (Number.isNaN(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be >= 0 (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values not yet received */
  get size(): number {
    return this.buffer.length;
  }

  send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError("Send on closed channel"));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
      const onAbort = () => {
        const index = this.senders.indexOf(pending);
        if (index !== -1) {
          this.senders.splice(index, 1);
          pending.reject(signal?.reason);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  receive(signal?: AbortSignal): Promise<ReceiveResult<T>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      // A slot opened up: admit the oldest waiting sender into the buffer
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push({ value: sender.value });
        sender.resolve();
      }
      return Promise.resolve({ done: false, value: buffered.value });
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }

    if (this.isClosed) {
      return Promise.resolve(DONE);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<ReceiveResult<T>>((resolve, reject) => {
      const pending: PendingReceive<T> = {
        resolve: (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      };
      const onAbort = () => {
        const index = this.receivers.indexOf(pending);
        if (index !== -1) {
          this.receivers.splice(index, 1);
          pending.reject(signal?.reason);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  /**
   * Close the channel. Closing twice throws, as does leaving a sender
   * blocked: its send is rejected with ChannelClosedError.
   */
  close(): void {
    if (this.isClosed) {
      throw new ChannelClosedError("Close of closed channel");
    }
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve(DONE);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError("Channel closed while sending"));
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }
}
