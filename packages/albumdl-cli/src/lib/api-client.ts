import fetch, { Headers, type RequestInit, type Response } from "node-fetch";
import type { AlbumLookup, LookupKind } from "./ports/album-lookup.js";
import type { Logger } from "./logger.js";
import {
  fromHttpStatus,
  malformedResponse,
  missingClientId,
  networkTimeout,
  transientFetchError,
} from "./errors/catalog.js";

/** The part of fetch the client relies on */
export type FetchLike = (
  url: string,
  init: RequestInit
) => Promise<Pick<Response, "ok" | "status" | "statusText" | "text">>;

export interface ApiClientOptions {
  baseUrl: string;
  clientId?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface GetJsonOptions {
  query?: Record<string, string>;
  /** What the request is about, used in not-found errors */
  resource: string;
}

export interface ApiClient {
  getJson(path: string, options: GetJsonOptions): Promise<unknown>;
}

export function createApiClient({
  baseUrl,
  clientId,
  timeoutMs = 30000,
  fetchImpl = fetch,
  logger,
}: ApiClientOptions): ApiClient {
  function parseBody(text: string): unknown {
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  async function getJson(path: string, { query = {}, resource }: GetJsonOptions): Promise<unknown> {
    if (!clientId) throw missingClientId();

    const url = new URL(path, baseUrl);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("client_id", clientId);

    const headers = new Headers();
    headers.set("Accept", "application/json");

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    logger?.debug("GET", { path: url.pathname, resource });

    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;
    try {
      const response = await fetchImpl(url.toString(), {
        method: "GET",
        headers,
        signal: controller.signal,
      });
      status = response.status;
      statusText = response.statusText;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) throw networkTimeout(timeoutMs);
      throw transientFetchError(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timer);
    }

    const payload = parseBody(text);

    if (!ok) {
      logger?.debug("API request failed", { status, resource });
      throw fromHttpStatus(status, statusText, resource, payload);
    }

    if (typeof payload === "string") {
      throw malformedResponse("response body is not JSON");
    }

    return payload;
  }

  return { getJson };
}

export interface AlbumEndpoints {
  /** Path template with an `{id}` placeholder */
  albumPath: string;
  galleryPath: string;
}

/**
 * Album lookup over the JSON API. Both kinds ask for their media list inline.
 */
export function createAlbumLookup(api: ApiClient, endpoints: AlbumEndpoints): AlbumLookup {
  return {
    lookup(kind: LookupKind, id: string): Promise<unknown> {
      const template = kind === "album" ? endpoints.albumPath : endpoints.galleryPath;
      const path = template.replace("{id}", encodeURIComponent(id));
      return api.getJson(path, { query: { include: "media" }, resource: id });
    },
  };
}
