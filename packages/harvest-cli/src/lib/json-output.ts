/**
 * Machine-readable output. One-shot commands print a `{ success, data }`
 * document; download runs stream NDJSON events, one per line.
 */

import { isJsonMode } from "./cli-context.js";
import { errorToJson } from "./errors/renderer.js";
import type { ComponentKind, OutcomeRecord, OutcomeStatus } from "./outcome.js";

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

/** Streamed once per outcome record */
export interface OutcomeRecordJson {
  type: "outcome";
  timestamp: string;
  component: ComponentKind;
  status: OutcomeStatus;
  subject?: string;
  files?: string[];
  error?: Record<string, string>;
}

/** Last line of a streamed run */
export interface RunSummaryJson {
  type: "summary";
  timestamp: string;
  fetched: number;
  failed: number;
  files: string[];
  durationMs: number;
  success: boolean;
}

export type RunEventJson = OutcomeRecordJson | RunSummaryJson;

export interface KeyStatusJson {
  configured: boolean;
  source?: "flag" | "env" | "store";
  key?: string;
  savedAt?: string;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

export function outcomeToJson(record: OutcomeRecord, now: Date = new Date()): OutcomeRecordJson {
  const json: OutcomeRecordJson = {
    type: "outcome",
    timestamp: now.toISOString(),
    component: record.componentKind,
    status: record.status,
  };
  if (record.subject !== undefined) json.subject = record.subject;
  if (record.files !== undefined) json.files = [...record.files];
  if (record.detail) json.error = errorToJson(record.detail);
  return json;
}

export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

export function outputNdjson(event: RunEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Print `data` as JSON and return true in JSON mode; otherwise return false
 * so the caller prints its human output.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (!isJsonMode()) return false;
  outputSuccess(data);
  return true;
}
