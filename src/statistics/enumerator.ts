import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Suffix written by producers while a result file is still being filled. */
export const IN_PROGRESS_SUFFIX = ".progress";

/**
 * Where result files come from. The two modes are mutually exclusive and are
 * chosen once for the whole run.
 */
export type ResultSourceSelection =
  | { readonly mode: "dirs"; readonly dirs: readonly string[] }
  | { readonly mode: "files"; readonly files: readonly string[] };

/** Candidate result file produced by {@link enumerateResultSources}. */
export interface ResultSource {
  readonly path: string;
  /** Directory being listed, `null` for explicitly provided files. */
  readonly directory: string | null;
}

export interface EnumerationOptions {
  /**
   * Sort each directory's entries lexicographically. Off by default: the
   * listing order of the platform is kept unless callers opt in.
   */
  readonly sortEntries?: boolean;
  /** Invoked before a directory is listed. */
  readonly onDirectory?: (directory: string) => void;
}

/** Entries that vanished or loop between `readdir` and `stat`. */
const UNREADABLE_ENTRY_CODES = new Set(["ENOENT", "ELOOP"]);

function isUnreadableEntryError(error: unknown): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "string" && UNREADABLE_ENTRY_CODES.has(error.code);
}

/** Whether an entry name is a reserved in-progress file. */
export function isInProgressFile(name: string): boolean {
  return name.endsWith(IN_PROGRESS_SUFFIX);
}

/**
 * Lists the result files of a single directory. Subdirectories and other
 * non-regular entries are skipped; symbolic links are followed and dangling
 * ones skipped.
 */
export async function listResultFiles(directory: string, options: EnumerationOptions = {}): Promise<string[]> {
  const names = await readdir(directory);
  const ordered = options.sortEntries ? [...names].sort() : names;
  const accepted: string[] = [];
  for (const name of ordered) {
    const path = join(directory, name);
    if (isInProgressFile(path)) {
      continue;
    }
    try {
      const stats = await stat(path);
      if (stats.isFile()) {
        accepted.push(path);
      }
    } catch (error) {
      if (!isUnreadableEntryError(error)) {
        throw error;
      }
    }
  }
  return accepted;
}

/**
 * Yields the candidate result files in processing order: directory by
 * directory in directory mode, verbatim in file mode. Directories are listed
 * lazily so each one is read only when the previous one has been consumed.
 */
export async function* enumerateResultSources(
  selection: ResultSourceSelection,
  options: EnumerationOptions = {},
): AsyncGenerator<ResultSource> {
  if (selection.mode === "files") {
    for (const path of selection.files) {
      yield { path, directory: null };
    }
    return;
  }

  for (const directory of selection.dirs) {
    options.onDirectory?.(directory);
    for (const path of await listResultFiles(directory, options)) {
      yield { path, directory };
    }
  }
}
