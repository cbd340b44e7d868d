/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { CLIError } from "./errors/types.js";
import type { ReferenceKind } from "./reference.js";
import type { FetchPlan } from "./reconciler.js";
import type { ExecutionReport } from "./executor.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
  meta?: {
    version?: string;
  };
}

export type JsonResult<T> = JsonSuccess<T> | JsonError;

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface FileEntryJson {
  /** 1-based, as in the file name */
  index: number;
  url: string;
  path: string;
  expectedSize: number;
  status: "skipped" | "downloaded" | "failed" | "planned";
  reason?: string;
  error?: {
    code: string;
    message: string;
  };
}

export interface FetchResultJson {
  album: {
    id: string;
    kind: ReferenceKind;
  };
  directory: string;
  dryRun: boolean;
  files: FileEntryJson[];
  summary: {
    total: number;
    skipped: number;
    downloaded: number;
    failed: number;
  };
}

// ============================================================================
// Builders
// ============================================================================

export function planToJson(
  album: FetchResultJson["album"],
  plan: FetchPlan
): FetchResultJson {
  const files = plan.entries.map((entry): FileEntryJson => ({
    index: entry.file.position + 1,
    url: entry.file.url,
    path: entry.path,
    expectedSize: entry.file.expectedSize,
    status: entry.action === "skip" ? "skipped" : "planned",
    ...(entry.reason && { reason: entry.reason }),
  }));

  return {
    album,
    directory: plan.directory,
    dryRun: true,
    files,
    summary: {
      total: plan.total,
      skipped: files.filter((f) => f.status === "skipped").length,
      downloaded: 0,
      failed: 0,
    },
  };
}

export function reportToJson(
  album: FetchResultJson["album"],
  directory: string,
  report: ExecutionReport
): FetchResultJson {
  const files = report.outcomes.map((outcome): FileEntryJson => {
    const { entry } = outcome;
    const base = {
      index: entry.file.position + 1,
      url: entry.file.url,
      path: entry.path,
      expectedSize: entry.file.expectedSize,
    };
    switch (outcome.status) {
      case "skipped":
        return { ...base, status: "skipped" };
      case "succeeded":
        return { ...base, status: "downloaded" };
      case "failed":
        return {
          ...base,
          status: "failed",
          error: { code: outcome.error.code, message: outcome.error.message },
        };
    }
  });

  return {
    album,
    directory,
    dryRun: false,
    files,
    summary: {
      total: report.total,
      skipped: report.skipped,
      downloaded: report.succeeded,
      failed: report.failures.length,
    },
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: CLIError | Error, meta?: JsonError["meta"]): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof CLIError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof CLIError && error.details && { details: error.details }),
    },
    ...(meta && { meta }),
  };
  console.error(JSON.stringify(result, null, 2));
}
