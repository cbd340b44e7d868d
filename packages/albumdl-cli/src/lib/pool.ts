import type { Logger } from "./logger.js";
import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PoolTask<T> {
  /** Unique identifier for this task */
  id: string;
  /** Performs the work; `attempt` starts at 1 */
  execute: (attempt: number) => Promise<T>;
}

export type PoolResult<T> =
  | { id: string; status: "fulfilled"; value: T; attempts: number }
  | { id: string; status: "rejected"; error: unknown; attempts: number };

export interface PoolOptions<T> {
  /** Maximum number of tasks running at once */
  concurrency: number;
  /** Number of times to retry a failed task */
  retryAttempts: number;
  /** Base delay between retries (exponential backoff applied) */
  retryDelayMs: number;
  logger: Logger;
  /** Whether a failure may be retried; every failure is by default */
  shouldRetry?: (error: unknown) => boolean;
  /** Stops starting tasks; queued and waiting tasks settle as rejected */
  signal?: AbortSignal;
  timers?: TimerService;
  /** Called once per task with its final result */
  onSettled?: (result: PoolResult<T>) => void;
}

export interface PoolStats {
  /** Tasks waiting for a free worker */
  pending: number;
  /** Tasks currently running */
  active: number;
  /** Tasks waiting out a retry delay */
  waiting: number;
  completed: number;
  failed: number;
  averageLatencyMs: number;
}

export interface WorkerPool<T> {
  enqueue(task: PoolTask<T>): void;
  /** Resolves with every result, in enqueue order, once nothing is left to run */
  drain(): Promise<PoolResult<T>[]>;
  getStats(): PoolStats;
}

interface Scheduled<T> {
  task: PoolTask<T>;
  attempt: number;
  order: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum number of latency samples to keep for rolling average */
const MAX_LATENCY_SAMPLES = 100;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded worker pool.
 * Each task settles into a tagged result; a failing task never affects
 * the others. Results are collected and handed out by `drain()`.
 */
export function createWorkerPool<T>(options: PoolOptions<T>): WorkerPool<T> {
  const {
    concurrency,
    retryAttempts,
    retryDelayMs,
    logger,
    shouldRetry = () => true,
    signal,
    timers = realTimerService,
    onSettled,
  } = options;

  const limit = Math.max(1, Math.floor(concurrency));
  const pending: Scheduled<T>[] = [];
  const waiting = new Map<NodeJS.Timeout, Scheduled<T>>();
  const results: Array<PoolResult<T> | undefined> = [];
  const latencies: number[] = [];
  const drainWaiters: Array<(results: PoolResult<T>[]) => void> = [];

  let active = 0;
  let completed = 0;
  let failed = 0;
  let nextOrder = 0;

  function getStats(): PoolStats {
    const avgLatency =
      latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0;

    return {
      pending: pending.length,
      active,
      waiting: waiting.size,
      completed,
      failed,
      averageLatencyMs: Math.round(avgLatency),
    };
  }

  function collected(): PoolResult<T>[] {
    return results.filter((r): r is PoolResult<T> => r !== undefined);
  }

  const onAbort = () => cancelRemaining();
  let listening = false;

  function listenForAbort(): void {
    if (listening || !signal || signal.aborted) return;
    signal.addEventListener("abort", onAbort, { once: true });
    listening = true;
  }

  function stopListening(): void {
    if (!listening) return;
    signal?.removeEventListener("abort", onAbort);
    listening = false;
  }

  function checkDrainComplete(): void {
    if (pending.length > 0 || active > 0 || waiting.size > 0) return;
    stopListening();
    const snapshot = collected();
    for (const resolve of drainWaiters.splice(0)) {
      resolve(snapshot);
    }
  }

  function settle(entry: Scheduled<T>, result: PoolResult<T>): void {
    results[entry.order] = result;
    if (result.status === "fulfilled") completed++;
    else failed++;
    onSettled?.(result);
  }

  function reject(entry: Scheduled<T>, error: unknown): void {
    settle(entry, { id: entry.task.id, status: "rejected", error, attempts: entry.attempt - 1 });
  }

  function cancelRemaining(): void {
    const reason: unknown = signal?.reason;
    for (const entry of pending.splice(0)) {
      reject(entry, reason);
    }
    for (const [timer, entry] of waiting) {
      timers.clearTimeout(timer);
      reject(entry, reason);
    }
    waiting.clear();
    logger.debug("Pool cancelled", { active });
    checkDrainComplete();
  }

  function processNext(): void {
    if (signal?.aborted) {
      cancelRemaining();
      return;
    }

    while (active < limit && pending.length > 0) {
      const entry = pending.shift();
      if (entry) {
        // Don't await - let it run concurrently
        void processTask(entry);
      }
    }

    checkDrainComplete();
  }

  async function processTask(entry: Scheduled<T>): Promise<void> {
    const { task, attempt } = entry;
    const startTime = Date.now();

    active++;
    logger.debug("Processing task", { taskId: task.id, attempt });

    try {
      const value = await task.execute(attempt);
      const latency = Date.now() - startTime;
      latencies.push(latency);
      if (latencies.length > MAX_LATENCY_SAMPLES) latencies.shift();

      settle(entry, { id: task.id, status: "fulfilled", value, attempts: attempt });
      logger.debug("Task completed", { taskId: task.id, latencyMs: latency });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      if (attempt <= retryAttempts && !signal?.aborted && shouldRetry(error)) {
        const delay = retryDelayMs * Math.pow(2, attempt - 1);
        logger.warn("Task failed, scheduling retry", {
          taskId: task.id,
          attempt,
          maxRetries: retryAttempts,
          retryDelayMs: delay,
          error: errorMessage,
        });

        const retry: Scheduled<T> = { ...entry, attempt: attempt + 1 };
        const timer = timers.setTimeout(() => {
          waiting.delete(timer);
          pending.push(retry);
          processNext();
        }, delay);
        waiting.set(timer, retry);
      } else {
        settle(entry, { id: task.id, status: "rejected", error, attempts: attempt });
        logger.debug("Task failed permanently", {
          taskId: task.id,
          attempts: attempt,
          error: errorMessage,
        });
      }
    } finally {
      active--;
      processNext();
    }
  }

  function enqueue(task: PoolTask<T>): void {
    pending.push({ task, attempt: 1, order: nextOrder++ });
    listenForAbort();
    logger.debug("Task enqueued", {
      taskId: task.id,
      pendingCount: pending.length,
    });
    processNext();
  }

  function drain(): Promise<PoolResult<T>[]> {
    return new Promise((resolve) => {
      drainWaiters.push(resolve);
      checkDrainComplete();
    });
  }

  return {
    enqueue,
    drain,
    getStats,
  };
}
