import { access } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import { namingExhausted } from "./errors/catalog.js";

/** Number of numbered variants tried before giving up */
export const MAX_NAME_ATTEMPTS = 100;

export interface PathNamingOptions {
  maxAttempts?: number;
  /** Existence probe; defaults to the filesystem */
  exists?: (path: string) => Promise<boolean>;
}

/**
 * Filesystem probe that treats only "not found" as free.
 * Any other error (permissions, IO) propagates.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Return a path nobody uses yet: the desired path itself, or
 * `<stem>_<k><ext>` for the smallest free k below maxAttempts.
 *
 * Does not create anything; two calls without a filesystem change in
 * between return the same path.
 */
export async function resolveAvailablePath(
  desiredPath: string,
  options: PathNamingOptions = {}
): Promise<string> {
  const { maxAttempts = MAX_NAME_ATTEMPTS, exists = pathExists } = options;

  if (!(await exists(desiredPath))) {
    return desiredPath;
  }

  const ext = extname(desiredPath);
  const stem = basename(desiredPath, ext);
  const dir = dirname(desiredPath);

  for (let i = 0; i < maxAttempts; i++) {
    const candidate = join(dir, `${stem}_${i}${ext}`);
    if (!(await exists(candidate))) {
      return candidate;
    }
  }

  throw namingExhausted(desiredPath, maxAttempts);
}

/** Characters that are unsafe in file names on common filesystems */
const UNSAFE_NAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/**
 * Derive a file name from a locator: the last segment of its URL path,
 * decoded, with unsafe characters replaced. Falls back to "download".
 */
export function suggestName(locator: string): string {
  let segment: string;
  try {
    const { pathname } = new URL(locator);
    segment = pathname.split("/").filter(Boolean).pop() ?? "";
  } catch {
    // Not an absolute URL: take the text after the last slash, minus any query
    segment = locator.split(/[?#]/)[0].split("/").filter(Boolean).pop() ?? "";
  }

  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // Malformed escapes: keep the raw segment
  }

  const safe = decoded.replace(UNSAFE_NAME_CHARS, "_").trim();
  if (safe === "" || safe === "." || safe === "..") {
    return "download";
  }
  return safe;
}
