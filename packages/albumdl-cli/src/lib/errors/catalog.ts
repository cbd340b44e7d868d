import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const REFERENCE_EXAMPLES = [
  "albumdl vNOUshX",
  "albumdl https://imgur.com/a/vNOUshX",
  "albumdl https://imgur.com/gallery/vNOUshX",
];

// ============================================================================
// Reference Errors
// ============================================================================

export function invalidReference(input: string, reason?: string): CLIError {
  const shown = input.trim() === "" ? "(empty)" : `"${input}"`;
  return new CLIError("REFERENCE_INVALID", `Not an album reference: ${shown}`, {
    suggestion: "Pass an album or gallery id, or the full URL of one",
    examples: REFERENCE_EXAMPLES,
    details: reason,
  });
}

// ============================================================================
// Catalog Errors
// ============================================================================

export function albumNotFound(id: string): CLIError {
  return new CLIError("ALBUM_NOT_FOUND", `No album or gallery with id "${id}"`, {
    suggestion: "Check the id or URL; the album may have been deleted or made private",
  });
}

export function transientFetchError(details?: string, cause?: Error, retryable = true): CLIError {
  return new CLIError("CATALOG_TRANSIENT", "Couldn't retrieve the album listing", {
    suggestion: "This is usually temporary. Run the same command again in a moment",
    details,
    retryable,
    cause,
  });
}

export function malformedResponse(details?: string): CLIError {
  return new CLIError("CATALOG_MALFORMED", "The album listing has an unexpected shape", {
    suggestion: "The remote API may have changed. Check for a newer albumdl release",
    details,
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function transferNetworkFailed(
  url: string,
  reason: string,
  options: { retryable?: boolean; cause?: Error } = {}
): CLIError {
  return new CLIError("TRANSFER_NETWORK", `Download failed: ${reason}`, {
    details: url,
    retryable: options.retryable ?? true,
    cause: options.cause,
  });
}

export function transferSizeMismatch(
  url: string,
  expected: number,
  actual: number,
  source: "declared" | "received"
): CLIError {
  const label = source === "declared" ? "server declared" : "received";
  return new CLIError(
    "TRANSFER_SIZE_MISMATCH",
    `Expected ${expected} bytes, ${label} ${actual}`,
    { details: url, retryable: true }
  );
}

export function transferWriteFailed(path: string, cause?: Error): CLIError {
  return new CLIError("TRANSFER_WRITE", `Can't write "${path}"`, {
    suggestion: "Check free disk space and permissions of the destination directory",
    details: cause?.message,
    cause,
  });
}

export function transferCancelled(): CLIError {
  return new CLIError("TRANSFER_CANCELLED", "Cancelled before completion", {
    suggestion: "Run the same command again to resume",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function missingClientId(): CLIError {
  return new CLIError("VALIDATION_MISSING_CLIENT_ID", "No API client id configured", {
    suggestion: "Set ALBUMDL_CLIENT_ID or api.clientId in your config file",
    examples: ["ALBUMDL_CLIENT_ID=<your-client-id> albumdl vNOUshX", "albumdl config init"],
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkTimeout(timeoutMs: number): CLIError {
  return new CLIError("NETWORK_TIMEOUT", `Request timed out after ${timeoutMs}ms`, {
    suggestion: "The server might be busy. Try again or raise --timeout",
    retryable: true,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

/**
 * Convert an HTTP error response from the album API to a CLIError.
 * `resource` is the album id the request was about.
 */
export function fromHttpStatus(
  status: number,
  statusText: string,
  resource: string,
  payload?: unknown
): CLIError {
  const details = extractErrorMessage(payload);

  switch (status) {
    case 404:
      return albumNotFound(resource);
    case 429:
      return transientFetchError(details ?? "Rate limited by the remote API");
    case 401:
    case 403:
      return new CLIError("VALIDATION_MISSING_CLIENT_ID", "The API rejected the client id", {
        suggestion: "Check ALBUMDL_CLIENT_ID or api.clientId in your config file",
        details,
      });
    default:
      if (status >= 500) {
        return transientFetchError(details ?? `${status} ${statusText}`);
      }
      return new CLIError(
        "UNKNOWN_ERROR",
        `Request failed (${status} ${statusText})`,
        { details }
      );
  }
}

/**
 * Extract error message from API response payload.
 */
function extractErrorMessage(payload: unknown): string | undefined {
  if (payload === undefined || payload === null || payload === "") return undefined;
  if (typeof payload === "string") return payload;
  if (typeof payload === "object") {
    for (const key of ["error_description", "error", "message"]) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === "string") return value;
    }
    const json = JSON.stringify(payload);
    return json === "{}" ? undefined : json;
  }
  return undefined;
}
