/**
 * The slice of the fetch API the HTTP collaborators rely on.
 * node-fetch satisfies it; tests pass small fakes.
 */

export interface FetchInit {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/** A response body that can be drained without reading it */
export interface DrainableBody {
  resume(): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export interface FetchResponseLike {
  ok: boolean;
  body?: DrainableBody | null;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponseLike>;

/**
 * Merge a caller signal with an optional per-request timeout.
 * Returns the timeout signal separately so callers can tell the two apart.
 */
export function withTimeout(
  signal: AbortSignal | undefined,
  timeoutMs: number
): { signal: AbortSignal | undefined; timeout: AbortSignal | undefined } {
  if (timeoutMs <= 0) {
    return { signal, timeout: undefined };
  }
  const timeout = AbortSignal.timeout(timeoutMs);
  return {
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    timeout,
  };
}
