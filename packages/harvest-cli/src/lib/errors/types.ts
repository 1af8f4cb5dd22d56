/**
 * Error codes for every failure the pipeline and CLI can report.
 * Each code belongs to exactly one category (see ERROR_CATEGORIES).
 */
export type ErrorCode =
  // Configuration errors
  | "CONFIG_INVALID_BUDGET"
  | "CONFIG_INVALID_FILE"
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  // Credentials
  | "AUTH_MISSING_KEY"
  | "AUTH_INVALID_KEY"
  // Descriptor source errors
  | "SEARCH_PARSE_FAILED"
  | "SEARCH_RATE_LIMITED"
  | "SEARCH_SERVER_ERROR"
  | "SEARCH_REQUEST_FAILED"
  | "DESCRIPTOR_INVALID"
  | "DESCRIPTOR_SOURCE_FAILED"
  // Transport errors
  | "TRANSPORT_FAILED"
  | "TRANSPORT_HTTP_STATUS"
  | "TRANSPORT_READ_FAILED"
  | "TRANSPORT_TIMEOUT"
  | "WRITE_FAILED"
  // Naming
  | "NAMING_EXHAUSTED"
  // Lifecycle
  | "CANCELLED"
  | "UNKNOWN_ERROR";

export type ErrorCategory =
  | "configuration"
  | "auth"
  | "parse"
  | "transport"
  | "naming"
  | "cancelled"
  | "unknown";

export const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  CONFIG_INVALID_BUDGET: "configuration",
  CONFIG_INVALID_FILE: "configuration",
  VALIDATION_MISSING_ARG: "configuration",
  VALIDATION_INVALID_OPTION: "configuration",
  AUTH_MISSING_KEY: "auth",
  AUTH_INVALID_KEY: "auth",
  SEARCH_PARSE_FAILED: "parse",
  SEARCH_RATE_LIMITED: "transport",
  SEARCH_SERVER_ERROR: "transport",
  SEARCH_REQUEST_FAILED: "transport",
  DESCRIPTOR_INVALID: "parse",
  DESCRIPTOR_SOURCE_FAILED: "parse",
  TRANSPORT_FAILED: "transport",
  TRANSPORT_HTTP_STATUS: "transport",
  TRANSPORT_READ_FAILED: "transport",
  TRANSPORT_TIMEOUT: "transport",
  WRITE_FAILED: "transport",
  NAMING_EXHAUSTED: "naming",
  CANCELLED: "cancelled",
  UNKNOWN_ERROR: "unknown",
};

/**
 * Error carrying a stable code plus optional hints for the person at the terminal.
 */
export class HarvestError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "HarvestError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }
}

/**
 * Type guard to check if an error is a HarvestError.
 */
export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}
