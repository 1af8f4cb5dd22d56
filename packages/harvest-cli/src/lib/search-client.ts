import fetch from "node-fetch";
import { z } from "zod";
import type { FetchLike } from "./http.js";
import {
  cancelled,
  fromSearchStatus,
  readFailed,
  searchParseFailed,
  transportFailed,
} from "./errors/catalog.js";
import type { ResourceDescriptor } from "./outcome.js";

export const DEFAULT_SEARCH_ENDPOINT = "https://api.datamarket.azure.com/Bing/Search/Image";

const SearchResponseSchema = z.object({
  d: z.object({
    results: z.array(
      z.object({
        Title: z.string(),
        MediaUrl: z.string(),
      })
    ),
  }),
});

export interface SearchClientOptions {
  accessKey: string;
  endpoint?: string;
  fetchImpl?: FetchLike;
}

export interface SearchClient {
  /** Run one image search and return its results as descriptors */
  search(query: string, signal?: AbortSignal): Promise<ResourceDescriptor[]>;
}

export function buildSearchUrl(endpoint: string, query: string): string {
  return `${endpoint}?$format=json&Query=${encodeURIComponent(`'${query}'`)}`;
}

export function createSearchClient({
  accessKey,
  endpoint = DEFAULT_SEARCH_ENDPOINT,
  fetchImpl = fetch,
}: SearchClientOptions): SearchClient {
  const authorization = `Basic ${Buffer.from(`${accessKey}:${accessKey}`).toString("base64")}`;

  async function search(query: string, signal?: AbortSignal): Promise<ResourceDescriptor[]> {
    const url = buildSearchUrl(endpoint, query);

    let response;
    try {
      response = await fetchImpl(url, {
        signal,
        headers: { Authorization: authorization, Accept: "application/json" },
      });
    } catch (error) {
      throw signal?.aborted ? cancelled() : transportFailed(endpoint, error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw signal?.aborted ? cancelled() : readFailed(endpoint, error);
    }

    if (!response.ok) {
      throw fromSearchStatus(response.status, response.statusText, text);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw searchParseFailed("Response is not valid JSON", error);
    }

    const parsed = SearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw searchParseFailed(
        issue ? `${issue.path.join(".")}: ${issue.message}` : "Unexpected response shape"
      );
    }

    return parsed.data.d.results.map((result) => ({
      title: result.Title,
      locator: result.MediaUrl,
    }));
  }

  return { search };
}

/**
 * Lazy descriptor source for the Orchestrator. The search runs on the first
 * pull, so a failed search surfaces before anything is yielded.
 */
export async function* searchDescriptors(
  client: SearchClient,
  query: string,
  signal?: AbortSignal
): AsyncGenerator<ResourceDescriptor> {
  const results = await client.search(query, signal);
  yield* results;
}
