import type { Readable } from "stream";
import { z } from "zod";
import { toHarvestError } from "./errors/catalog.js";
import type { HarvestError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Data Model
// ---------------------------------------------------------------------------

/** Schema every descriptor is validated against before a fetch starts */
export const ResourceDescriptorSchema = z.object({
  title: z.string(),
  locator: z.string().min(1, "locator must not be empty"),
});

/** One downloadable resource: a display title and a fetchable address */
export type ResourceDescriptor = z.infer<typeof ResourceDescriptorSchema>;

/** Content handed from a Fetcher to the Sink; the body can be read once */
export interface FetchedContent {
  suggestedName: string;
  body: Readable;
  descriptor: ResourceDescriptor;
}

export type ComponentKind = "Orchestrator" | "Fetcher" | "Sink";

export type OutcomeStatus = "success" | "failure";

/** The single report each component instance makes per run */
export interface OutcomeRecord {
  componentKind: ComponentKind;
  status: OutcomeStatus;
  detail?: HarvestError;
  /** Locator for a Fetcher */
  subject?: string;
  /** Paths the Sink wrote */
  files?: readonly string[];
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: HarvestError };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: HarvestError): Result<T> {
  return { ok: false, error };
}

/**
 * Run a component body and capture how it ended as a Result.
 * Whatever the body throws is converted to a HarvestError.
 */
export async function settle<T>(body: () => Promise<T>): Promise<Result<T>> {
  try {
    return success(await body());
  } catch (error) {
    return failure(toHarvestError(error));
  }
}

/**
 * Build the record for a finished component.
 */
export function toOutcomeRecord(
  componentKind: ComponentKind,
  result: Result<unknown>,
  extras: { subject?: string; files?: readonly string[] } = {}
): OutcomeRecord {
  const record: OutcomeRecord = {
    componentKind,
    status: result.ok ? "success" : "failure",
  };
  if (!result.ok) record.detail = result.error;
  if (extras.subject !== undefined) record.subject = extras.subject;
  if (extras.files !== undefined) record.files = extras.files;
  return record;
}
