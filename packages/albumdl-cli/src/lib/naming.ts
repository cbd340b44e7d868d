import { basename, dirname, join } from "path";

/** Suffix of in-progress downloads; such files never carry a final name. */
export const PARTIAL_SUFFIX = ".part";

/**
 * Number of decimal digits of a non-negative integer (0 has one digit).
 */
export function digitCount(n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Expected a non-negative integer, got ${n}`);
  }
  return String(n).length;
}

/**
 * Width the visible index is padded to for an album of `total` files.
 */
export function indexWidth(total: number): number {
  return Math.max(2, digitCount(total));
}

/**
 * Lower-cased extension of the last path segment of `url`, without the dot.
 * Empty when the URL has none or it is not purely alphanumeric.
 */
export function extensionFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }

  const segment = pathname.slice(pathname.lastIndexOf("/") + 1);
  const dot = segment.lastIndexOf(".");
  if (dot <= 0) return "";

  const ext = segment.slice(dot + 1).toLowerCase();
  return /^[a-z0-9]+$/.test(ext) ? ext : "";
}

/**
 * File name for the file at 0-based `position` of an album of `total` files.
 * The visible index is 1-based and zero-padded to `indexWidth(total)`.
 */
export function nameFor(position: number, total: number, url?: string): string {
  if (!Number.isInteger(position) || position < 0 || position >= total) {
    throw new RangeError(`Position ${position} is outside [0, ${total})`);
  }

  const index = String(position + 1).padStart(indexWidth(total), "0");
  const ext = url === undefined ? "" : extensionFromUrl(url);
  return ext ? `${index}.${ext}` : index;
}

export function destinationPath(
  directory: string,
  file: { position: number; url: string },
  total: number
): string {
  return join(directory, nameFor(file.position, total, file.url));
}

/**
 * Hidden sibling the transfer writes to before renaming into place.
 * Same directory, so the rename never crosses filesystems.
 */
export function temporaryPathFor(finalPath: string): string {
  return join(dirname(finalPath), `.${basename(finalPath)}${PARTIAL_SUFFIX}`);
}
