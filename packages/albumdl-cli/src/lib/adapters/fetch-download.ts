import type { DownloadService, TransferStream } from "../ports/download.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "./real-timers.js";
import { transferCancelled, transferNetworkFailed } from "../errors/catalog.js";

type FetchFn = typeof globalThis.fetch;
type ResponseBody = NonNullable<Awaited<ReturnType<FetchFn>>["body"]>;

export interface FetchDownloadOptions {
  fetchImpl?: FetchFn;
  /** Time allowed until response headers arrive */
  timeoutMs?: number;
  timers?: TimerService;
}

/**
 * Parse Content-Length. A compressed body is decoded by fetch, so its
 * header describes a different byte count and is not a declared length.
 */
export function declaredLengthOf(headers: {
  get(name: string): string | null;
}): number | undefined {
  const encoding = headers.get("content-encoding");
  if (encoding && encoding.toLowerCase() !== "identity") return undefined;

  const raw = headers.get("content-length");
  if (raw === null || !/^\d+$/.test(raw.trim())) return undefined;
  return Number(raw.trim());
}

async function* readChunks(
  body: ResponseBody,
  onSettled: () => void
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    try {
      if (!finished) await reader.cancel();
    } finally {
      onSettled();
    }
  }
}

/**
 * Create a download service using fetch.
 */
export function createFetchDownloadService({
  fetchImpl = globalThis.fetch,
  timeoutMs = 30000,
  timers = realTimerService,
}: FetchDownloadOptions = {}): DownloadService {
  return {
    async open(url, options = {}): Promise<TransferStream> {
      const { signal } = options;
      if (signal?.aborted) throw transferCancelled();

      const controller = new AbortController();
      const forwardAbort = () => controller.abort();
      signal?.addEventListener("abort", forwardAbort, { once: true });
      const detach = () => signal?.removeEventListener("abort", forwardAbort);

      let timedOut = false;
      const timer = timers.setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);

      let response: Awaited<ReturnType<FetchFn>>;
      try {
        response = await fetchImpl(url, { signal: controller.signal });
      } catch (error) {
        detach();
        if (signal?.aborted) throw transferCancelled();
        if (timedOut) {
          throw transferNetworkFailed(url, `no response within ${timeoutMs}ms`);
        }
        throw transferNetworkFailed(url, error instanceof Error ? error.message : String(error), {
          cause: error instanceof Error ? error : undefined,
        });
      } finally {
        timers.clearTimeout(timer);
      }

      if (!response.ok) {
        detach();
        throw transferNetworkFailed(url, `HTTP ${response.status} ${response.statusText}`, {
          retryable: response.status >= 500 || response.status === 429,
        });
      }

      if (!response.body) {
        detach();
        throw transferNetworkFailed(url, "response has no body");
      }

      const body = response.body;
      return {
        declaredLength: declaredLengthOf(response.headers),
        body: readChunks(body, detach),
        discard: async () => {
          detach();
          await body.cancel();
        },
      };
    },
  };
}
