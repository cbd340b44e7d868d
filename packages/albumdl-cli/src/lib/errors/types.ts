/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Reference errors
  | "REFERENCE_INVALID"
  // Catalog errors
  | "ALBUM_NOT_FOUND"
  | "CATALOG_TRANSIENT"
  | "CATALOG_MALFORMED"
  // Transfer errors (per file, never fatal to the run)
  | "TRANSFER_NETWORK"
  | "TRANSFER_SIZE_MISMATCH"
  | "TRANSFER_WRITE"
  | "TRANSFER_CANCELLED"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_MISSING_CLIENT_ID"
  // Network errors
  | "NETWORK_TIMEOUT"
  // Generic
  | "UNKNOWN_ERROR";

/** Codes that belong to a single file transfer. */
export type TransferErrorCode = Extract<ErrorCode, `TRANSFER_${string}`>;

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  details?: string;
  /** Whether repeating the same operation may succeed */
  retryable?: boolean;
  cause?: Error;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Check an unknown error against one or more codes.
 */
export function hasErrorCode(error: unknown, ...codes: ErrorCode[]): error is CLIError {
  return isCLIError(error) && codes.includes(error.code);
}

export function isTransferErrorCode(code: ErrorCode): code is TransferErrorCode {
  return code.startsWith("TRANSFER_");
}
