import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { getEventListeners } from "events";
import { createWorkerPool, type PoolResult } from "./pool.js";
import type { Logger } from "./logger.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

describe("worker pool", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs at most `concurrency` tasks at once", async () => {
    const pool = createWorkerPool<string>({
      concurrency: 2,
      retryAttempts: 0,
      retryDelayMs: 1000,
      logger: createMockLogger(),
    });

    let running = 0;
    let peak = 0;
    for (const id of ["a", "b", "c", "d", "e"]) {
      pool.enqueue({
        id,
        execute: async () => {
          running++;
          peak = Math.max(peak, running);
          await sleep(100);
          running--;
          return id;
        },
      });
    }

    expect(pool.getStats()).toMatchObject({ active: 2, pending: 3 });

    const drained = pool.drain();
    await vi.advanceTimersByTimeAsync(1000);
    const results = await drained;

    expect(peak).toBe(2);
    expect(results.map((r) => r.status)).toEqual(Array(5).fill("fulfilled"));
  });

  it("returns results in enqueue order, whatever order they finish in", async () => {
    const pool = createWorkerPool<string>({
      concurrency: 3,
      retryAttempts: 0,
      retryDelayMs: 1000,
      logger: createMockLogger(),
    });

    const durations: Record<string, number> = { slow: 300, medium: 200, fast: 100 };
    for (const [id, ms] of Object.entries(durations)) {
      pool.enqueue({
        id,
        execute: async () => {
          await sleep(ms);
          return id;
        },
      });
    }

    const drained = pool.drain();
    await vi.advanceTimersByTimeAsync(1000);

    expect((await drained).map((r) => r.id)).toEqual(["slow", "medium", "fast"]);
  });

  it("retries failed tasks with exponential backoff", async () => {
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 2,
      retryDelayMs: 1000,
      logger: createMockLogger(),
    });

    const attempts: number[] = [];
    pool.enqueue({
      id: "flaky",
      execute: async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error("Fail");
        return "success";
      },
    });

    await vi.advanceTimersByTimeAsync(10);
    expect(attempts).toEqual([1]);
    expect(pool.getStats().waiting).toBe(1);

    // First retry after 1000ms
    await vi.advanceTimersByTimeAsync(1000);
    expect(attempts).toEqual([1, 2]);

    // Second retry after 2000ms
    await vi.advanceTimersByTimeAsync(1500);
    expect(attempts).toEqual([1, 2]);
    await vi.advanceTimersByTimeAsync(500);
    expect(attempts).toEqual([1, 2, 3]);

    const [result] = await pool.drain();
    expect(result).toEqual({ id: "flaky", status: "fulfilled", value: "success", attempts: 3 });
  });

  it("drain stays pending while a retry is waiting", async () => {
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 1,
      retryDelayMs: 1000,
      logger: createMockLogger(),
    });

    pool.enqueue({
      id: "flaky",
      execute: async (attempt) => {
        if (attempt === 1) throw new Error("Fail");
        return "ok";
      },
    });

    let drained: PoolResult<string>[] | undefined;
    void pool.drain().then((results) => {
      drained = results;
    });

    await vi.advanceTimersByTimeAsync(500);
    expect(drained).toBeUndefined();

    await vi.advanceTimersByTimeAsync(600);
    expect(drained?.[0]?.status).toBe("fulfilled");
  });

  it("gives up after the retries are used", async () => {
    const logger = createMockLogger();
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 2,
      retryDelayMs: 100,
      logger,
    });

    const error = new Error("Always fails");
    pool.enqueue({
      id: "always-fails",
      execute: async () => {
        throw error;
      },
    });

    const drained = pool.drain();
    await vi.advanceTimersByTimeAsync(300);
    const [result] = await drained;

    expect(result).toEqual({ id: "always-fails", status: "rejected", error, attempts: 3 });
    expect(pool.getStats()).toMatchObject({ completed: 0, failed: 1 });
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("does not retry when shouldRetry declines", async () => {
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 3,
      retryDelayMs: 100,
      logger: createMockLogger(),
      shouldRetry: () => false,
    });

    const execute = vi.fn(async () => {
      throw new Error("permanent");
    });
    pool.enqueue({ id: "once", execute });

    const [result] = await pool.drain();

    expect(execute).toHaveBeenCalledTimes(1);
    expect(result?.attempts).toBe(1);
  });

  it("keeps going when one task fails", async () => {
    const pool = createWorkerPool<number>({
      concurrency: 2,
      retryAttempts: 0,
      retryDelayMs: 100,
      logger: createMockLogger(),
    });

    pool.enqueue({ id: "1", execute: async () => 1 });
    pool.enqueue({
      id: "2",
      execute: async () => {
        throw new Error("boom");
      },
    });
    pool.enqueue({ id: "3", execute: async () => 3 });

    const results = await pool.drain();

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    expect(pool.getStats()).toMatchObject({ completed: 2, failed: 1 });
  });

  it("reports every result to onSettled", async () => {
    const onSettled = vi.fn();
    const pool = createWorkerPool<number>({
      concurrency: 1,
      retryAttempts: 0,
      retryDelayMs: 100,
      logger: createMockLogger(),
      onSettled,
    });

    pool.enqueue({ id: "a", execute: async () => 1 });
    pool.enqueue({ id: "b", execute: async () => 2 });
    await pool.drain();

    expect(onSettled.mock.calls.map(([result]) => result.id)).toEqual(["a", "b"]);
  });

  it("resolves drain at once when nothing was enqueued", async () => {
    const pool = createWorkerPool<number>({
      concurrency: 1,
      retryAttempts: 0,
      retryDelayMs: 100,
      logger: createMockLogger(),
    });

    await expect(pool.drain()).resolves.toEqual([]);
  });

  it("rejects queued and waiting tasks on abort", async () => {
    const controller = new AbortController();
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 1,
      retryDelayMs: 1000,
      logger: createMockLogger(),
      signal: controller.signal,
    });

    pool.enqueue({
      id: "retrying",
      execute: async (attempt) => {
        if (attempt === 1) throw new Error("Fail");
        return "late";
      },
    });
    pool.enqueue({
      id: "running",
      execute: async () => {
        await sleep(200);
        return "done";
      },
    });
    pool.enqueue({ id: "queued", execute: async () => "never" });

    await vi.advanceTimersByTimeAsync(10);
    expect(pool.getStats()).toMatchObject({ active: 1, pending: 1, waiting: 1 });

    const reason = new Error("stop");
    controller.abort(reason);
    const drained = pool.drain();
    await vi.advanceTimersByTimeAsync(200);
    const results = await drained;

    expect(results).toEqual([
      { id: "retrying", status: "rejected", error: reason, attempts: 1 },
      { id: "running", status: "fulfilled", value: "done", attempts: 1 },
      { id: "queued", status: "rejected", error: reason, attempts: 0 },
    ]);
  });

  it("stops listening to the signal once drained", async () => {
    const controller = new AbortController();
    const pool = createWorkerPool<string>({
      concurrency: 1,
      retryAttempts: 0,
      retryDelayMs: 100,
      logger: createMockLogger(),
      signal: controller.signal,
    });

    pool.enqueue({
      id: "a",
      execute: async () => {
        await sleep(50);
        return "done";
      },
    });
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(1);

    const drained = pool.drain();
    await vi.advanceTimersByTimeAsync(50);
    await drained;

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });
});
