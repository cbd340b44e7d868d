/** Lookup endpoints the remote service exposes. */
export type LookupKind = "album" | "gallery";

/**
 * Abstraction for the remote album lookup.
 * Resolves to the decoded JSON body; rejects with ALBUM_NOT_FOUND when the
 * service has no such album, or with a retryable error for transient faults.
 */
export interface AlbumLookup {
  lookup(kind: LookupKind, id: string): Promise<unknown>;
}
