import { z } from "zod";
import type { AlbumLookup, LookupKind } from "./ports/album-lookup.js";
import type { AlbumId, AlbumReference } from "./reference.js";
import type { Logger } from "./logger.js";
import { hasErrorCode, isCLIError, type ErrorCode } from "./errors/types.js";
import { albumNotFound, malformedResponse, transientFetchError } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One remote media file of an album. */
export interface RemoteFile {
  /** 0-based, dense and unique within the album */
  readonly position: number;
  readonly url: string;
  /** Size in bytes the service reports */
  readonly expectedSize: number;
}

/** Remote files in album display order. */
export interface AlbumCatalog {
  readonly id: AlbumId;
  /** Endpoint the listing came from */
  readonly kind: LookupKind;
  readonly files: readonly RemoteFile[];
}

export interface FetchCatalogOptions {
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Response Decoding
// ---------------------------------------------------------------------------

const MediaSchema = z.object({
  url: z.string().url(),
  size: z.number().int().nonnegative(),
  position: z.number().int().optional(),
});

const AlbumResponseSchema = z.object({
  media: z.array(MediaSchema),
});

type MediaRecord = z.infer<typeof MediaSchema>;

/**
 * Keep the service's positions only when they already count 0..N-1 in the
 * order the items arrived; otherwise number items by arrival.
 */
export function assignPositions(
  media: readonly MediaRecord[],
  logger?: Logger
): RemoteFile[] {
  const contiguous = media.every((item, index) => item.position === index);

  if (!contiguous && media.some((item) => item.position !== undefined)) {
    logger?.debug("Re-indexing catalog by encounter order", {
      reported: media.map((item) => item.position ?? null),
    });
  }

  return media.map((item, index) =>
    Object.freeze({ position: index, url: item.url, expectedSize: item.size })
  );
}

/**
 * Decode a raw lookup response into remote files.
 * Throws CATALOG_MALFORMED when the shape does not match.
 */
export function decodeCatalogResponse(raw: unknown, logger?: Logger): RemoteFile[] {
  const result = AlbumResponseSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw malformedResponse(issues);
  }
  return assignPositions(result.data.media, logger);
}

// ---------------------------------------------------------------------------
// Fetching
// ---------------------------------------------------------------------------

function lookupOrder(reference: AlbumReference): LookupKind[] {
  switch (reference.kind) {
    case "album":
      return ["album"];
    case "gallery":
      return ["gallery"];
    case "unknown":
      return ["album", "gallery"];
  }
}

/** Lookup errors that reach the caller as they are; others become CATALOG_TRANSIENT. */
const PASSED_THROUGH: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "ALBUM_NOT_FOUND",
  "CATALOG_TRANSIENT",
  "CATALOG_MALFORMED",
  "VALIDATION_MISSING_CLIENT_ID",
]);

async function lookupOnce(lookup: AlbumLookup, kind: LookupKind, id: AlbumId): Promise<unknown> {
  try {
    return await lookup.lookup(kind, id);
  } catch (error) {
    if (isCLIError(error)) {
      if (PASSED_THROUGH.has(error.code)) throw error;
      throw transientFetchError(error.message, error, error.retryable);
    }
    throw transientFetchError(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Retrieve the ordered list of remote files for an album reference.
 *
 * A reference of unknown kind tries the album endpoint first and the
 * gallery endpoint when the album endpoint reports not found.
 */
export async function fetchCatalog(
  lookup: AlbumLookup,
  reference: AlbumReference,
  options: FetchCatalogOptions = {}
): Promise<AlbumCatalog> {
  const { logger } = options;

  for (const kind of lookupOrder(reference)) {
    let raw: unknown;
    try {
      raw = await lookupOnce(lookup, kind, reference.id);
    } catch (error) {
      if (hasErrorCode(error, "ALBUM_NOT_FOUND")) {
        logger?.debug("Lookup reported not found", { id: reference.id, kind });
        continue;
      }
      throw error;
    }

    const files = decodeCatalogResponse(raw, logger);
    logger?.info("Catalog retrieved", { id: reference.id, kind, files: files.length });
    return Object.freeze({ id: reference.id, kind, files: Object.freeze(files) });
  }

  throw albumNotFound(reference.id);
}
