import { z } from "zod";

/**
 * Top-level shape a decoded file must have to count as a result file. Extra
 * sections are tolerated so newer producers can add metadata.
 */
export const ResultDocumentSchema = z
  .object({
    params: z.record(z.string(), z.unknown()),
    results: z.array(z.unknown()),
  })
  .passthrough();

/**
 * One run of a mininet result file. Only `outputs_dir` is consumed here; the
 * metrics (`oracle`, `cost`, `nhops`, per-heuristic reachability...) are read by
 * the aggregator from the outputs directory.
 */
export const RunResultSchema = z
  .object({
    outputs_dir: z.string().min(1),
  })
  .passthrough();

/** Current producers write the file name; older ones wrote `[reader, file]`. */
export const TopoSchema = z.union([z.string(), z.tuple([z.string(), z.string()])]);
