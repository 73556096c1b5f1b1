import { readFile } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { StructuredLogger } from "../logger.js";

/** Why a file was skipped instead of processed. */
export type SkipReason = "invalid_json" | "missing_sections";

/**
 * Outcome of {@link loadResultFile}. A skip is a soft condition: the caller
 * moves on to the next file.
 */
export type LoadOutcome =
  | { readonly status: "loaded"; readonly path: string; readonly document: unknown }
  | { readonly status: "skipped"; readonly path: string; readonly reason: SkipReason; readonly detail: string };

/**
 * Reads and decodes one candidate file. Undecodable content yields a skip
 * (stray or partially written files live beside result files); filesystem
 * errors propagate.
 */
export async function loadResultFile(path: string, logger: StructuredLogger): Promise<LoadOutcome> {
  const content = await readFile(path, "utf8");
  try {
    const document: unknown = JSON.parse(content);
    return { status: "loaded", path, document };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.debug("result_file_skipped", { path, reason: "invalid_json", detail });
    return { status: "skipped", path, reason: "invalid_json", detail };
  }
}
