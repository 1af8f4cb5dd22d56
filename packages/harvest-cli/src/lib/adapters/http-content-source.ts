import fetch from "node-fetch";
import { Readable } from "stream";
import type { ContentSource, RetrievedContent } from "../ports/content-source.js";
import { withTimeout, type FetchLike } from "../http.js";
import {
  cancelled,
  httpStatusFailed,
  readFailed,
  timedOut,
  transportFailed,
} from "../errors/catalog.js";
import type { HarvestError } from "../errors/types.js";

export interface HttpContentSourceOptions {
  fetchImpl?: FetchLike;
  /** Per-request timeout; 0 disables it */
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Create a content source that retrieves resources over HTTP(S).
 * The body is read completely before it is handed on, so read failures
 * belong to the fetch that caused them.
 */
export function createHttpContentSource({
  fetchImpl = fetch,
  timeoutMs = 0,
  userAgent = "harvest-cli",
}: HttpContentSourceOptions = {}): ContentSource {
  return {
    async fetch(locator: string, signal?: AbortSignal): Promise<RetrievedContent> {
      const { signal: combined, timeout } = withTimeout(signal, timeoutMs);

      // Aborts win over whatever error the fetch implementation surfaced
      const classify = (
        error: unknown,
        fallback: (locator: string, cause: unknown) => HarvestError
      ): HarvestError => {
        if (signal?.aborted) return cancelled();
        if (timeout?.aborted) return timedOut(locator, timeoutMs);
        return fallback(locator, error);
      };

      let response;
      try {
        response = await fetchImpl(locator, {
          signal: combined,
          headers: { "User-Agent": userAgent },
        });
      } catch (error) {
        throw classify(error, transportFailed);
      }

      if (!response.ok) {
        // Drain the unread body so the keep-alive socket is released
        response.body?.once("error", () => {});
        response.body?.resume();
        throw httpStatusFailed(locator, response.status, response.statusText);
      }

      let bytes: Buffer;
      try {
        bytes = Buffer.from(await response.arrayBuffer());
      } catch (error) {
        throw classify(error, readFailed);
      }

      return { body: Readable.from(bytes.length > 0 ? [bytes] : []) };
    },
  };
}
