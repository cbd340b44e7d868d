import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  abandonTemporary,
  execute,
  isSuccessful,
  transferFile,
  toTransferError,
} from "./executor.js";
import { buildPlan, planFromListing } from "./reconciler.js";
import type { AlbumCatalog } from "./catalog.js";
import type { DownloadService, TransferStream } from "./ports/download.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { createFetchDownloadService } from "./adapters/fetch-download.js";
import { transientFetchError } from "./errors/catalog.js";

interface FakeResource {
  body: Uint8Array[] | (() => AsyncIterable<Uint8Array>);
  declaredLength?: number;
}

function bytes(length: number, fill = 1): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

async function* chunks(...parts: Uint8Array[]): AsyncIterable<Uint8Array> {
  for (const part of parts) yield part;
}

function fakeDownload(resources: Record<string, FakeResource>) {
  const open = vi.fn(async (url: string): Promise<TransferStream> => {
    const resource = resources[url];
    if (!resource) throw new Error(`unexpected url ${url}`);
    const { body } = resource;
    return {
      declaredLength: resource.declaredLength,
      body: typeof body === "function" ? body() : chunks(...body),
    };
  });
  return { open } satisfies DownloadService;
}

function catalogOf(sizes: number[]): AlbumCatalog {
  return {
    id: "abc",
    kind: "album",
    files: sizes.map((expectedSize, position) => ({
      position,
      url: `https://i.example.test/${position}.jpg`,
      expectedSize,
    })),
  };
}

const url = (position: number) => `https://i.example.test/${position}.jpg`;

const baseOptions = {
  concurrency: 2,
  retryAttempts: 0,
  retryDelayMs: 1,
  logger: createNoopLogger(),
};

describe("executor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "albumdl-executor-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("downloads a whole album into numbered files", async () => {
    const download = fakeDownload({
      [url(0)]: { body: [bytes(4), bytes(6)] },
      [url(1)]: { body: [bytes(20)], declaredLength: 20 },
      [url(2)]: { body: [bytes(10), bytes(10), bytes(10)] },
    });
    const plan = await buildPlan(dir, catalogOf([10, 20, 30]));

    const report = await execute(plan, { ...baseOptions, download });

    expect(report).toMatchObject({ total: 3, skipped: 0, succeeded: 3, failures: [] });
    expect(isSuccessful(report)).toBe(true);
    expect((await readdir(dir)).sort()).toEqual(["01.jpg", "02.jpg", "03.jpg"]);
    expect((await readFile(join(dir, "03.jpg"))).length).toBe(30);
  });

  it("skips files that are already complete", async () => {
    const download = fakeDownload({ [url(1)]: { body: [bytes(20)] } });
    const plan = planFromListing(dir, catalogOf([10, 20]), new Map([["01.jpg", 10]]));

    const report = await execute(plan, { ...baseOptions, download });

    expect(report.outcomes.map((o) => o.status)).toEqual(["skipped", "succeeded"]);
    expect(report).toMatchObject({ skipped: 1, succeeded: 1 });
    expect(download.open).toHaveBeenCalledTimes(1);
    expect(download.open).toHaveBeenCalledWith(url(1), { signal: undefined });
  });

  it("leaves no file behind when a transfer breaks off, and a rerun completes it", async () => {
    async function* brokenBody(): AsyncIterable<Uint8Array> {
      yield bytes(5);
      throw new Error("connection reset");
    }
    const catalog = catalogOf([10, 10]);

    const first = await execute(await buildPlan(dir, catalog), {
      ...baseOptions,
      download: fakeDownload({
        [url(0)]: { body: [bytes(10)] },
        [url(1)]: { body: brokenBody },
      }),
    });

    expect(first.succeeded).toBe(1);
    expect(first.failures).toHaveLength(1);
    expect(first.failures[0]?.error.code).toBe("TRANSFER_NETWORK");
    expect(first.failures[0]?.error.message).toBe("Download failed: connection reset");
    expect(await readdir(dir)).toEqual(["01.jpg"]);

    const download = fakeDownload({ [url(1)]: { body: [bytes(10)] } });
    const second = await execute(await buildPlan(dir, catalog), { ...baseOptions, download });

    expect(second).toMatchObject({ skipped: 1, succeeded: 1, failures: [] });
    expect((await readdir(dir)).sort()).toEqual(["01.jpg", "02.jpg"]);
  });

  it("isolates a file that keeps failing", async () => {
    const download = fakeDownload({
      [url(0)]: { body: [bytes(10)] },
      [url(1)]: { body: [bytes(15)] },
      [url(2)]: { body: [bytes(30)] },
    });
    const plan = await buildPlan(dir, catalogOf([10, 20, 30]));

    const report = await execute(plan, { ...baseOptions, retryAttempts: 1, download });

    expect(report.succeeded).toBe(2);
    expect(report.failures).toHaveLength(1);
    const [failure] = report.failures;
    expect(failure?.file.position).toBe(1);
    expect(failure?.path).toBe(join(dir, "02.jpg"));
    expect(failure?.error.code).toBe("TRANSFER_SIZE_MISMATCH");
    expect(failure?.error.message).toBe("Expected 20 bytes, received 15");
    expect(report.outcomes[1]).toMatchObject({ status: "failed", attempts: 2 });
    expect(isSuccessful(report)).toBe(false);
    expect((await readdir(dir)).sort()).toEqual(["01.jpg", "03.jpg"]);
  });

  it("reports outcomes as they settle", async () => {
    const onOutcome = vi.fn();
    const download = fakeDownload({
      [url(0)]: { body: [bytes(1)] },
      [url(1)]: { body: [bytes(2)] },
    });
    const plan = await buildPlan(dir, catalogOf([1, 2]));

    await execute(plan, { ...baseOptions, download, onOutcome });

    expect(onOutcome).toHaveBeenCalledTimes(2);
    expect(onOutcome).toHaveBeenCalledWith(expect.objectContaining({ status: "succeeded", bytes: 2 }));
  });

  it("does not retry write errors", async () => {
    const download = fakeDownload({ [url(0)]: { body: [bytes(3)] } });
    // Planned without creating the directory
    const plan = planFromListing(join(dir, "missing"), catalogOf([3]), new Map());

    const report = await execute(plan, { ...baseOptions, retryAttempts: 3, download });

    expect(report.failures[0]?.error.code).toBe("TRANSFER_WRITE");
    expect(report.outcomes[0]).toMatchObject({ status: "failed", attempts: 1 });
    expect(download.open).toHaveBeenCalledTimes(1);
  });

  it("discards the download when the partial file cannot be opened", async () => {
    const discard = vi.fn(async () => {});
    const download = {
      open: vi.fn(async (): Promise<TransferStream> => ({ body: chunks(bytes(3)), discard })),
    } satisfies DownloadService;
    const plan = planFromListing(join(dir, "missing"), catalogOf([3]), new Map());

    const report = await execute(plan, { ...baseOptions, download });

    expect(report.failures[0]?.error.code).toBe("TRANSFER_WRITE");
    expect(discard).toHaveBeenCalledTimes(1);
  });

  it("cancels a transfer in flight and removes its partial file", async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn(
      async (_input: Parameters<typeof fetch>[0], init?: Parameters<typeof fetch>[1]) => {
        let sent = false;
        const body = new ReadableStream<Uint8Array>({
          start(stream) {
            init?.signal?.addEventListener("abort", () =>
              stream.error(new DOMException("This operation was aborted", "AbortError"))
            );
          },
          pull(stream) {
            if (sent) {
              // Half of the file has been handed out
              controller.abort();
              return;
            }
            sent = true;
            stream.enqueue(bytes(5));
          },
        });
        return new Response(body, { headers: { "content-length": "10" } });
      }
    );
    const plan = await buildPlan(dir, catalogOf([10]));

    const report = await execute(plan, {
      ...baseOptions,
      retryAttempts: 2,
      download: createFetchDownloadService({ fetchImpl }),
      signal: controller.signal,
    });

    expect(report.failures.map((f) => f.error.code)).toEqual(["TRANSFER_CANCELLED"]);
    expect(report.outcomes[0]).toMatchObject({ status: "failed", attempts: 1 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(await readdir(dir)).toEqual([]);
  });

  it("cancels every transfer when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const download = fakeDownload({ [url(0)]: { body: [bytes(1)] } });
    const plan = await buildPlan(dir, catalogOf([1]));

    const report = await execute(plan, { ...baseOptions, download, signal: controller.signal });

    expect(report.failures.map((f) => f.error.code)).toEqual(["TRANSFER_CANCELLED"]);
    expect(download.open).not.toHaveBeenCalled();
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("transferFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "albumdl-transfer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function entryFor(expectedSize: number) {
    const [entry] = planFromListing(dir, catalogOf([expectedSize]), new Map()).entries;
    if (!entry) throw new Error("no entry");
    return entry;
  }

  it("writes to a hidden partial file until the size is reached", async () => {
    const finalPath = join(dir, "01.jpg");
    const partialPath = join(dir, ".01.jpg.part");
    const seen: Array<[boolean, boolean]> = [];

    async function* observedBody(): AsyncIterable<Uint8Array> {
      yield bytes(4);
      seen.push([existsSync(partialPath), existsSync(finalPath)]);
      yield bytes(4);
    }

    const written = await transferFile(entryFor(8), fakeDownload({ [url(0)]: { body: observedBody } }));

    expect(written).toBe(8);
    expect(seen).toEqual([[true, false]]);
    expect(existsSync(partialPath)).toBe(false);
    expect((await readFile(finalPath)).length).toBe(8);
  });

  it("refuses a declared length that differs before writing", async () => {
    const download = fakeDownload({ [url(0)]: { body: [bytes(9)], declaredLength: 9 } });

    await expect(transferFile(entryFor(8), download)).rejects.toMatchObject({
      code: "TRANSFER_SIZE_MISMATCH",
      message: "Expected 8 bytes, server declared 9",
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it("stops reading once the body is longer than expected", async () => {
    const download = fakeDownload({ [url(0)]: { body: [bytes(6), bytes(6), bytes(6)] } });

    await expect(transferFile(entryFor(8), download)).rejects.toMatchObject({
      code: "TRANSFER_SIZE_MISMATCH",
      message: "Expected 8 bytes, received 12",
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it("accepts an empty file", async () => {
    const written = await transferFile(entryFor(0), fakeDownload({ [url(0)]: { body: [] } }));

    expect(written).toBe(0);
    expect(await readdir(dir)).toEqual(["01.jpg"]);
  });
});

describe("abandonTemporary", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "albumdl-abandon-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("removes the partial file even when closing it fails", async () => {
    const tempPath = join(dir, ".01.jpg.part");
    await writeFile(tempPath, bytes(4));
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    const handle = { close: vi.fn(async () => Promise.reject(new Error("EIO: i/o error"))) };

    await abandonTemporary(handle, tempPath, logger);

    expect(existsSync(tempPath)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Closing a partial file failed", {
      path: tempPath,
      error: "EIO: i/o error",
    });
  });

  it("only removes the file when there is nothing to close", async () => {
    const tempPath = join(dir, ".01.jpg.part");
    await writeFile(tempPath, bytes(4));

    await abandonTemporary(undefined, tempPath);

    expect(await readdir(dir)).toEqual([]);
  });
});

describe("toTransferError", () => {
  const entry = planFromListing("/albums/abc", catalogOf([1]), new Map()).entries[0];

  it("keeps transfer errors as they are", () => {
    if (!entry) throw new Error("no entry");
    const error = toTransferError(new Error("reset"), entry);
    expect(toTransferError(error, entry)).toBe(error);
  });

  it("wraps other errors as network failures", () => {
    if (!entry) throw new Error("no entry");
    const error = toTransferError(new Error("reset"), entry);
    expect(error.code).toBe("TRANSFER_NETWORK");
    expect(error.details).toBe(url(0));
    expect(error.retryable).toBe(true);
  });

  it("keeps the retry flag of other CLI errors", () => {
    if (!entry) throw new Error("no entry");
    const error = toTransferError(transientFetchError("HTTP 503"), entry);
    expect(error.code).toBe("TRANSFER_NETWORK");
    expect(error.retryable).toBe(true);
  });

  it("treats abort errors as cancellation", () => {
    if (!entry) throw new Error("no entry");
    const abort = new Error("aborted");
    abort.name = "AbortError";
    expect(toTransferError(abort, entry).code).toBe("TRANSFER_CANCELLED");
  });
});
