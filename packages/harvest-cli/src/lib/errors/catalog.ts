import { HarvestError, isHarvestError } from "./types.js";

/**
 * Error catalog - factory functions for every HarvestError the project raises.
 * Keeping messages here keeps them consistent between the pipeline and the CLI.
 */

// ============================================================================
// Configuration Errors
// ============================================================================

export function invalidBudget(budget: number): HarvestError {
  return new HarvestError(
    "CONFIG_INVALID_BUDGET",
    `Concurrency budget must be a positive integer (got ${budget})`,
    { suggestion: "Pass --concurrency with a value of 1 or more" }
  );
}

export function invalidConfig(path: string, issues: string[]): HarvestError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new HarvestError("CONFIG_INVALID_FILE", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function missingArgument(argName: string, command: string): HarvestError {
  return new HarvestError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
  });
}

export function invalidOption(optionName: string, reason: string): HarvestError {
  return new HarvestError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

// ============================================================================
// Credentials
// ============================================================================

export function missingAccessKey(): HarvestError {
  return new HarvestError("AUTH_MISSING_KEY", "No search access key configured", {
    suggestion: "Pass --access-key, set HARVEST_ACCESS_KEY, or run `harvest key set`",
  });
}

export function invalidAccessKey(details?: string): HarvestError {
  return new HarvestError("AUTH_INVALID_KEY", "The search backend rejected the access key", {
    suggestion: "Check the key and store it again with `harvest key set`",
    details,
  });
}

// ============================================================================
// Descriptor Source Errors
// ============================================================================

export function searchParseFailed(reason: string, cause?: unknown): HarvestError {
  return new HarvestError("SEARCH_PARSE_FAILED", "Couldn't read the search response", {
    details: reason,
    cause,
  });
}

export function descriptorInvalid(index: number, issues: string[]): HarvestError {
  return new HarvestError("DESCRIPTOR_INVALID", `Descriptor #${index} is malformed`, {
    details: issues.join("; "),
  });
}

export function descriptorSourceFailed(cause: unknown): HarvestError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new HarvestError("DESCRIPTOR_SOURCE_FAILED", "The descriptor source failed", {
    details: reason,
    cause,
  });
}

// ============================================================================
// Transport Errors
// ============================================================================

export function transportFailed(locator: string, cause: unknown): HarvestError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new HarvestError("TRANSPORT_FAILED", `Couldn't reach ${locator}`, {
    details: reason,
    cause,
  });
}

export function httpStatusFailed(
  locator: string,
  status: number,
  statusText: string
): HarvestError {
  const label = statusText ? `${status} ${statusText}` : String(status);
  return new HarvestError("TRANSPORT_HTTP_STATUS", `Request for ${locator} failed (${label})`);
}

export function readFailed(locator: string, cause: unknown): HarvestError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new HarvestError("TRANSPORT_READ_FAILED", `Couldn't read the body of ${locator}`, {
    details: reason,
    cause,
  });
}

export function timedOut(locator: string, timeoutMs: number): HarvestError {
  return new HarvestError("TRANSPORT_TIMEOUT", `Request for ${locator} timed out after ${timeoutMs}ms`, {
    suggestion: "Raise --timeout or pass 0 to disable it",
  });
}

export function writeFailed(path: string, cause: unknown): HarvestError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new HarvestError("WRITE_FAILED", `Couldn't write ${path}`, {
    details: reason,
    cause,
  });
}

/**
 * Fold several per-file write errors into one record detail.
 */
export function writesFailed(errors: HarvestError[]): HarvestError {
  if (errors.length === 1) {
    return errors[0];
  }
  return new HarvestError("WRITE_FAILED", `${errors.length} files could not be written`, {
    details: errors.map((e) => e.message).join("\n"),
    cause: errors[0],
  });
}

// ============================================================================
// Naming
// ============================================================================

export function namingExhausted(path: string, attempts: number): HarvestError {
  return new HarvestError(
    "NAMING_EXHAUSTED",
    `${attempts} files already have a name similar to ${path}`,
    { suggestion: "Choose another --output-dir or clean up the existing files" }
  );
}

// ============================================================================
// Search HTTP Status Mapping
// ============================================================================

/**
 * Convert a failed search response to a HarvestError.
 */
export function fromSearchStatus(status: number, statusText: string, body?: string): HarvestError {
  const details = body?.trim() ? body.trim() : undefined;

  switch (status) {
    case 401:
    case 403:
      return invalidAccessKey(details);
    case 429:
      return new HarvestError("SEARCH_RATE_LIMITED", "The search backend is throttling requests", {
        suggestion: "Wait a moment and try again",
      });
    default:
      if (status >= 500) {
        return new HarvestError("SEARCH_SERVER_ERROR", "The search backend failed", {
          details: details ?? `${status} ${statusText}`,
        });
      }
      return new HarvestError(
        "SEARCH_REQUEST_FAILED",
        `Search request failed (${status} ${statusText})`,
        { details }
      );
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

export function cancelled(): HarvestError {
  return new HarvestError("CANCELLED", "The run was cancelled");
}

export function unknownError(error: unknown): HarvestError {
  const message = error instanceof Error ? error.message : String(error);
  return new HarvestError("UNKNOWN_ERROR", message, { cause: error });
}

/**
 * Convert anything thrown into a HarvestError.
 * Abort reasons raised by AbortSignal become CANCELLED or TRANSPORT_TIMEOUT.
 */
export function toHarvestError(error: unknown): HarvestError {
  if (isHarvestError(error)) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return cancelled();
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return new HarvestError("TRANSPORT_TIMEOUT", error.message, { cause: error });
  }
  return unknownError(error);
}
