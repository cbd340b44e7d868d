import { invalidReference } from "./errors/catalog.js";

/** Identifier of an album or gallery on the remote service. */
export type AlbumId = string;

export type ReferenceKind = "album" | "gallery" | "unknown";

export interface AlbumReference {
  id: AlbumId;
  /** Which lookup endpoint the input pointed at, when the URL says so */
  kind: ReferenceKind;
}

const RECOGNIZED_HOSTS = new Set(["imgur.com", "www.imgur.com", "m.imgur.com"]);

const IDENTIFIER = /^[A-Za-z0-9]+$/;

const KIND_BY_SEGMENT: Record<string, ReferenceKind> = {
  a: "album",
  gallery: "gallery",
};

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/**
 * Gallery URLs may carry a title slug: `/gallery/cute-cats-vNOUshX`.
 */
function identifierFromSegment(segment: string): string {
  const dash = segment.lastIndexOf("-");
  return dash === -1 ? segment : segment.slice(dash + 1);
}

/**
 * Normalize a bare id or an album/gallery URL into an album reference.
 * Performs no network access.
 */
export function resolveReference(input: string): AlbumReference {
  const trimmed = input.trim();

  if (trimmed === "") {
    throw invalidReference(input, "the reference is empty");
  }

  if (isIdentifier(trimmed)) {
    return { id: trimmed, kind: "unknown" };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw invalidReference(input, "neither an id nor a URL");
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw invalidReference(input, `unsupported scheme ${url.protocol}`);
  }

  if (!RECOGNIZED_HOSTS.has(url.hostname.toLowerCase())) {
    throw invalidReference(input, `unrecognized host ${url.hostname}`);
  }

  // Keep empty segments so a trailing slash leaves an empty last segment
  const segments = url.pathname.split("/").slice(1);
  const last = segments[segments.length - 1] ?? "";

  if (last === "") {
    throw invalidReference(input, "the URL ends with a path separator");
  }

  const id = identifierFromSegment(last);
  if (!isIdentifier(id)) {
    throw invalidReference(input, `"${last}" is not an id`);
  }

  const kind =
    segments.length >= 2 ? KIND_BY_SEGMENT[segments[segments.length - 2]] ?? "unknown" : "unknown";

  return { id, kind };
}

/**
 * Extract only the album id from a reference string.
 */
export function resolveAlbumId(input: string): AlbumId {
  return resolveReference(input).id;
}
