import { open, rename, rm } from "fs/promises";
import type { RemoteFile } from "./catalog.js";
import type { FetchPlan, PlanEntry } from "./reconciler.js";
import type { DownloadService } from "./ports/download.js";
import type { TimerService } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { createWorkerPool, type PoolResult } from "./pool.js";
import { temporaryPathFor } from "./naming.js";
import { CLIError, isCLIError, isTransferErrorCode } from "./errors/types.js";
import {
  transferCancelled,
  transferNetworkFailed,
  transferSizeMismatch,
  transferWriteFailed,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransferFailure {
  readonly file: RemoteFile;
  readonly path: string;
  readonly error: CLIError;
}

export type TransferOutcome =
  | { status: "skipped"; entry: PlanEntry }
  | { status: "succeeded"; entry: PlanEntry; bytes: number; attempts: number }
  | { status: "failed"; entry: PlanEntry; error: CLIError; attempts: number };

export interface ExecutionReport {
  total: number;
  skipped: number;
  succeeded: number;
  /** In position order */
  failures: TransferFailure[];
  /** One per plan entry, in position order */
  outcomes: TransferOutcome[];
}

export interface ExecuteOptions {
  download: DownloadService;
  /** Transfers running at once */
  concurrency: number;
  /** Extra attempts for a transfer that failed with a retryable error */
  retryAttempts: number;
  retryDelayMs: number;
  logger: Logger;
  signal?: AbortSignal;
  timers?: TimerService;
  /** Called as each transfer settles, in completion order */
  onOutcome?: (outcome: TransferOutcome) => void;
}

// ---------------------------------------------------------------------------
// Single Transfer
// ---------------------------------------------------------------------------

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Map any failure of one transfer onto a transfer error code.
 */
export function toTransferError(error: unknown, entry: PlanEntry, signal?: AbortSignal): CLIError {
  if (isCLIError(error) && isTransferErrorCode(error.code)) return error;
  if (signal?.aborted || isAbortError(error)) return transferCancelled();
  if (isCLIError(error)) {
    return transferNetworkFailed(entry.file.url, error.message, {
      retryable: error.retryable,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return transferNetworkFailed(entry.file.url, message, {
    cause: error instanceof Error ? error : undefined,
  });
}

async function writeFileSafely<R>(path: string, action: () => Promise<R>): Promise<R> {
  try {
    return await action();
  } catch (error) {
    throw transferWriteFailed(path, error instanceof Error ? error : undefined);
  }
}

/** The part of an open file handle the cleanup needs. */
export interface ClosableFile {
  close(): Promise<void>;
}

/**
 * Close and remove an abandoned temporary file. A failing close is logged;
 * the caller keeps reporting the error that ended the transfer.
 */
export async function abandonTemporary(
  handle: ClosableFile | undefined,
  tempPath: string,
  logger?: Logger
): Promise<void> {
  try {
    if (handle) await handle.close();
  } catch (closeError) {
    logger?.warn("Closing a partial file failed", {
      path: tempPath,
      error: closeError instanceof Error ? closeError.message : String(closeError),
    });
  } finally {
    await rm(tempPath, { force: true });
  }
}

/**
 * Download one plan entry into place.
 *
 * Bytes go to a hidden temporary file which is renamed onto the final path
 * only after exactly `expectedSize` bytes were written and the file was
 * closed. Any failure removes the temporary file; the final path is never
 * written directly.
 *
 * @returns Number of bytes written
 */
export async function transferFile(
  entry: PlanEntry,
  download: DownloadService,
  signal?: AbortSignal,
  logger?: Logger
): Promise<number> {
  const { file, path } = entry;
  const tempPath = temporaryPathFor(path);
  const expected = file.expectedSize;

  if (signal?.aborted) throw transferCancelled();

  const stream = await download.open(file.url, { signal });

  if (stream.declaredLength !== undefined && stream.declaredLength !== expected) {
    await stream.discard?.();
    throw transferSizeMismatch(file.url, expected, stream.declaredLength, "declared");
  }

  let handle: Awaited<ReturnType<typeof open>>;
  try {
    handle = await writeFileSafely(tempPath, () => open(tempPath, "w"));
  } catch (error) {
    await stream.discard?.();
    throw error;
  }
  let closed = false;
  let received = 0;

  try {
    for await (const chunk of stream.body) {
      received += chunk.byteLength;
      if (received > expected) {
        throw transferSizeMismatch(file.url, expected, received, "received");
      }
      await writeFileSafely(tempPath, () => handle.write(chunk));
    }

    if (received !== expected) {
      throw transferSizeMismatch(file.url, expected, received, "received");
    }

    await writeFileSafely(tempPath, () => handle.close());
    closed = true;
    await writeFileSafely(path, () => rename(tempPath, path));
    return received;
  } catch (error) {
    await abandonTemporary(closed ? undefined : handle, tempPath, logger);
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Plan Execution
// ---------------------------------------------------------------------------

function outcomeOf(entry: PlanEntry, result: PoolResult<number>, signal?: AbortSignal): TransferOutcome {
  if (result.status === "fulfilled") {
    return { status: "succeeded", entry, bytes: result.value, attempts: result.attempts };
  }
  return {
    status: "failed",
    entry,
    error: toTransferError(result.error, entry, signal),
    attempts: result.attempts,
  };
}

/**
 * Run every fetch entry of a plan through a bounded worker pool.
 *
 * Failures stay local to their file and are reported; the run itself
 * always completes. Outcomes are collected after the pool drains and
 * reported in position order.
 */
export async function execute(plan: FetchPlan, options: ExecuteOptions): Promise<ExecutionReport> {
  const { download, logger, signal, onOutcome } = options;
  const toFetch = plan.entries.filter((e) => e.action === "fetch");
  const byId = new Map(toFetch.map((entry) => [String(entry.file.position), entry]));

  logger.info("Executing plan", {
    directory: plan.directory,
    total: plan.total,
    fetch: toFetch.length,
    concurrency: options.concurrency,
  });

  const pool = createWorkerPool<number>({
    concurrency: options.concurrency,
    retryAttempts: options.retryAttempts,
    retryDelayMs: options.retryDelayMs,
    logger: logger.child({ component: "pool" }),
    signal,
    timers: options.timers,
    shouldRetry: (error) => isCLIError(error) && error.retryable,
    onSettled: (result) => {
      const entry = byId.get(result.id);
      if (entry && onOutcome) onOutcome(outcomeOf(entry, result, signal));
    },
  });

  for (const entry of toFetch) {
    const fileLogger = logger.child({ position: entry.file.position });
    pool.enqueue({
      id: String(entry.file.position),
      execute: async (attempt) => {
        fileLogger.debug("Transfer starting", { url: entry.file.url, path: entry.path, attempt });
        try {
          const bytes = await transferFile(entry, download, signal, fileLogger);
          fileLogger.info("Transfer complete", { bytes });
          return bytes;
        } catch (error) {
          const transferError = toTransferError(error, entry, signal);
          fileLogger.warn("Transfer failed", { code: transferError.code, error: transferError.message });
          throw transferError;
        }
      },
    });
  }

  const results = new Map((await pool.drain()).map((r) => [r.id, r]));

  const outcomes = plan.entries.map((entry): TransferOutcome => {
    if (entry.action === "skip") return { status: "skipped", entry };
    const result = results.get(String(entry.file.position));
    if (!result) {
      return { status: "failed", entry, error: transferCancelled(), attempts: 0 };
    }
    return outcomeOf(entry, result, signal);
  });

  const failures: TransferFailure[] = [];
  let skipped = 0;
  let succeeded = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "skipped") skipped++;
    else if (outcome.status === "succeeded") succeeded++;
    else failures.push({ file: outcome.entry.file, path: outcome.entry.path, error: outcome.error });
  }

  logger.info("Plan executed", { skipped, succeeded, failed: failures.length });

  return { total: plan.total, skipped, succeeded, failures, outcomes };
}

/**
 * A run succeeds exactly when no file failed.
 */
export function isSuccessful(report: ExecutionReport): boolean {
  return report.failures.length === 0;
}
