import type { AdmissionGate } from "../admission-gate.js";
import type { Channel } from "../channel.js";
import type { ContentSource } from "../ports/content-source.js";
import type { Supervisor } from "../supervisor.js";
import { settle, type FetchedContent, type ResourceDescriptor } from "../outcome.js";
import { suggestName } from "../path-naming.js";

export interface FetcherOptions {
  source: ContentSource;
  /** Shared channel into the Sink */
  content: Channel<FetchedContent>;
  /** Slot holder this fetch releases when it ends */
  gate: AdmissionGate;
  supervisor: Supervisor;
  signal?: AbortSignal;
}

/**
 * Create the fetch task used for every admitted descriptor.
 *
 * Each call registers one emitter, performs one retrieval, hands the body to
 * the Sink on success, reports, and then frees its admission slot. The
 * returned promise never rejects for retrieval errors; those become the
 * Fetcher's failure record.
 */
export function createFetcher(options: FetcherOptions): (descriptor: ResourceDescriptor) => Promise<void> {
  const { source, content, gate, supervisor, signal } = options;

  return async function fetchOne(descriptor: ResourceDescriptor): Promise<void> {
    const emitter = supervisor.register("Fetcher", descriptor.locator);

    try {
      const result = await settle<void>(async () => {
        signal?.throwIfAborted();
        const retrieved = await source.fetch(descriptor.locator, signal);
        const item: FetchedContent = {
          suggestedName: suggestName(descriptor.locator),
          body: retrieved.body,
          descriptor,
        };

        try {
          await content.send(item, signal);
        } catch (error) {
          // Never reached the Sink, so the body is still ours to discard
          retrieved.body.destroy();
          throw error;
        }
      });

      await emitter.emit(result);
    } finally {
      gate.release();
    }
  };
}
