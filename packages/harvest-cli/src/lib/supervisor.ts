import { Channel } from "./channel.js";
import {
  toOutcomeRecord,
  type ComponentKind,
  type OutcomeRecord,
  type Result,
} from "./outcome.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Handle a component uses to report its one outcome */
export interface OutcomeEmitter {
  readonly componentKind: ComponentKind;
  readonly emitted: boolean;
  emit(result: Result<unknown>, extras?: { files?: readonly string[] }): Promise<void>;
}

export interface Supervisor {
  /**
   * Register an emitter that owes one record. Must happen before the
   * component could possibly finish, and before the channel closes.
   */
  register(componentKind: ComponentKind, subject?: string): OutcomeEmitter;
  /** Outcome records in emission order; ends once every emitter reported */
  records(): AsyncIterable<OutcomeRecord>;
  /** Emitters registered but not yet reported */
  readonly pending: number;
  readonly closed: boolean;
}

export interface SupervisorOptions {
  /** Outcome channel capacity; unbounded unless given */
  capacity?: number;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * The supervisor owns the outcome channel and is the only party that closes
 * it: it counts registered emitters and closes once the last one reported.
 */
export function createSupervisor(options: SupervisorOptions = {}): Supervisor {
  const channel = new Channel<OutcomeRecord>(options.capacity ?? Infinity);
  let pending = 0;

  function register(componentKind: ComponentKind, subject?: string): OutcomeEmitter {
    if (channel.closed) {
      throw new Error(`Cannot register ${componentKind}: outcome channel already closed`);
    }
    pending++;
    let emitted = false;

    return {
      componentKind,
      get emitted() {
        return emitted;
      },
      async emit(result, extras = {}) {
        if (emitted) {
          throw new Error(`${componentKind} already reported its outcome`);
        }
        emitted = true;

        await channel.send(toOutcomeRecord(componentKind, result, { subject, ...extras }));

        pending--;
        if (pending === 0) {
          channel.close();
        }
      },
    };
  }

  return {
    register,
    records: () => channel,
    get pending() {
      return pending;
    },
    get closed() {
      return channel.closed;
    },
  };
}
