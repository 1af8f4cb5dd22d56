import { createWindowGate, type AdmissionGate, type GateFactory } from "../admission-gate.js";
import type { Channel } from "../channel.js";
import type { ContentSource } from "../ports/content-source.js";
import type { Supervisor } from "../supervisor.js";
import { descriptorInvalid, descriptorSourceFailed } from "../errors/catalog.js";
import { isHarvestError } from "../errors/types.js";
import {
  ResourceDescriptorSchema,
  settle,
  type FetchedContent,
  type ResourceDescriptor,
} from "../outcome.js";
import { createFetcher } from "./fetcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DescriptorSource =
  | Iterable<ResourceDescriptor>
  | AsyncIterable<ResourceDescriptor>;

export interface OrchestratorOptions {
  /** Maximum number of Fetchers alive at once */
  budget: number;
  source: ContentSource;
  /** Channel into the Sink; closed by the Orchestrator when it finishes */
  content: Channel<FetchedContent>;
  supervisor: Supervisor;
  signal?: AbortSignal;
  /** Admission policy; a sliding window by default */
  createGate?: GateFactory;
}

export interface OrchestratorReport {
  /** Fetchers launched */
  launched: number;
  /** Most Fetchers alive at the same time */
  peakInFlight: number;
}

export interface Orchestrator {
  /** Consume the descriptors and fetch each one; never rejects */
  run(descriptors: DescriptorSource): Promise<OrchestratorReport>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

async function* iterate(descriptors: DescriptorSource): AsyncGenerator<ResourceDescriptor> {
  yield* descriptors;
}

/**
 * Create the component that turns a descriptor stream into bounded
 * concurrent fetches.
 *
 * Admission: before taking the next descriptor, wait for a free slot; each
 * Fetcher frees its slot when it ends. After the source is exhausted (or
 * fails, or the run is cancelled) every in-flight Fetcher is joined, the
 * Orchestrator reports, and only then is the content channel closed so the
 * Sink is always the last to report.
 */
export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const {
    budget,
    source,
    content,
    supervisor,
    signal,
    createGate = createWindowGate,
  } = options;
  const emitter = supervisor.register("Orchestrator");

  async function admit(
    gate: AdmissionGate,
    descriptors: DescriptorSource,
    inFlight: Set<Promise<void>>
  ): Promise<number> {
    const fetchOne = createFetcher({ source, content, gate, supervisor, signal });
    const iterator = iterate(descriptors);
    let launched = 0;
    let exhausted = false;

    try {
      for (;;) {
        await gate.acquire(signal);

        let next: IteratorResult<ResourceDescriptor>;
        try {
          next = await iterator.next();
        } catch (error) {
          gate.release();
          exhausted = true;
          throw isHarvestError(error) ? error : descriptorSourceFailed(error);
        }

        if (next.done) {
          gate.release();
          exhausted = true;
          return launched;
        }

        const parsed = ResourceDescriptorSchema.safeParse(next.value);
        if (!parsed.success) {
          gate.release();
          throw descriptorInvalid(
            launched,
            parsed.error.issues.map((i) => `${i.path.join(".") || "descriptor"}: ${i.message}`)
          );
        }

        const task = fetchOne(parsed.data);
        inFlight.add(task);
        void task.finally(() => inFlight.delete(task));
        launched++;
      }
    } finally {
      if (!exhausted) {
        await iterator.return(undefined);
      }
    }
  }

  async function run(descriptors: DescriptorSource): Promise<OrchestratorReport> {
    const inFlight = new Set<Promise<void>>();
    let gate: AdmissionGate | undefined;
    let launched = 0;

    const result = await settle(async () => {
      gate = createGate(budget);
      try {
        launched = await admit(gate, descriptors, inFlight);
      } finally {
        // Join every launched Fetcher, on success and failure alike
        await Promise.all(inFlight);
      }
      return launched;
    });

    const report: OrchestratorReport = {
      launched,
      peakInFlight: gate?.peak ?? 0,
    };

    try {
      await emitter.emit(result);
    } finally {
      content.close();
    }
    return report;
  }

  return { run };
}
