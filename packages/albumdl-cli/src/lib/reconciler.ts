import { mkdir, readdir, stat } from "fs/promises";
import { basename, join } from "path";
import type { AlbumCatalog, RemoteFile } from "./catalog.js";
import { destinationPath } from "./naming.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PlanAction = "skip" | "fetch";

export type FetchReason = "missing" | "size-mismatch";

export interface PlanEntry {
  readonly file: RemoteFile;
  /** Final path the file lives at once complete */
  readonly path: string;
  readonly action: PlanAction;
  readonly reason?: FetchReason;
  /** Size found on disk, when a regular file exists at `path` */
  readonly localSize?: number;
}

export interface FetchPlan {
  readonly directory: string;
  readonly total: number;
  /** One entry per catalog file, in position order */
  readonly entries: readonly PlanEntry[];
}

/** Regular files of a directory by name, with their byte sizes. */
export type DiskListing = ReadonlyMap<string, number>;

// ---------------------------------------------------------------------------
// Disk Inspection
// ---------------------------------------------------------------------------

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * List regular files of `directory` with their sizes.
 * A directory that does not exist yet lists as empty. Only metadata is read.
 */
export async function inspectDirectory(directory: string): Promise<DiskListing> {
  let names: string[];
  try {
    const dirents = await readdir(directory, { withFileTypes: true });
    names = dirents.filter((d) => d.isFile()).map((d) => d.name);
  } catch (error) {
    if (isNotFound(error)) {
      return new Map();
    }
    throw error;
  }

  const listing = new Map<string, number>();
  for (const name of names) {
    try {
      const stats = await stat(join(directory, name));
      listing.set(name, stats.size);
    } catch (error) {
      // Removed since readdir; treat as absent
      if (!isNotFound(error)) throw error;
    }
  }
  return listing;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Decide skip or fetch for every catalog file.
 * A file counts as complete when its on-disk size equals the size the
 * service reports; contents are never compared.
 */
export function planFromListing(
  directory: string,
  catalog: AlbumCatalog,
  listing: DiskListing
): FetchPlan {
  const total = catalog.files.length;

  const entries = catalog.files.map((file): PlanEntry => {
    const path = destinationPath(directory, file, total);
    const localSize = listing.get(basename(path));

    if (localSize === undefined) {
      return Object.freeze({ file, path, action: "fetch", reason: "missing" });
    }
    if (localSize !== file.expectedSize) {
      return Object.freeze({ file, path, action: "fetch", reason: "size-mismatch", localSize });
    }
    return Object.freeze({ file, path, action: "skip", localSize });
  });

  return Object.freeze({ directory, total, entries: Object.freeze(entries) });
}

/**
 * Create the destination directory if needed and plan the run against it.
 */
export async function buildPlan(directory: string, catalog: AlbumCatalog): Promise<FetchPlan> {
  await mkdir(directory, { recursive: true });
  const listing = await inspectDirectory(directory);
  return planFromListing(directory, catalog, listing);
}

export interface PlanSummary {
  total: number;
  skip: number;
  fetch: number;
}

export function summarizePlan(plan: FetchPlan): PlanSummary {
  const skip = plan.entries.filter((e) => e.action === "skip").length;
  return { total: plan.total, skip, fetch: plan.total - skip };
}
