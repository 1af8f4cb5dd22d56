import type { Readable } from "stream";

/** Body of one retrieved resource */
export interface RetrievedContent {
  /** Read-once byte stream */
  body: Readable;
}

/**
 * Abstraction for retrieving a resource by locator.
 * Allows testing the pipeline without actual network requests.
 */
export interface ContentSource {
  /** Retrieve the resource; rejects with a HarvestError on any failure */
  fetch(locator: string, signal?: AbortSignal): Promise<RetrievedContent>;
}
