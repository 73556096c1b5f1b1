import { dirname, isAbsolute, join } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { StructuredLogger } from "../logger.js";
import type { StatisticsAccumulator, StatisticsAggregator } from "./aggregator.js";
import { MalformedParameterError, UnrecognisedExperimentTypeError, UnsupportedExperimentTypeError } from "./errors.js";
import { RunResultSchema } from "./schemas.js";
import type { ExperimentType, NormalizedParameters } from "./types.js";

export interface ExtractionContext<A extends StatisticsAggregator> {
  /** Result file the runs were read from; outputs directories are relative to it. */
  readonly sourcePath: string | null;
  readonly experimentType: ExperimentType;
  readonly parameters: NormalizedParameters;
  readonly accumulator: StatisticsAccumulator<A>;
  readonly logger: StructuredLogger;
}

/**
 * Resolves every run's `outputs_dir` against the directory holding the result
 * file. Without a source path the directories stay relative to the working
 * directory. Absolute entries are kept as written.
 */
export function resolveOutputDirectories(
  results: readonly unknown[],
  sourcePath: string | null,
  logger: StructuredLogger,
): string[] {
  if (sourcePath === null) {
    logger.warn("outputs_dir_relative_to_cwd", {
      hint: "no result file path given; each run's outputs_dir is resolved from the working directory",
    });
  }
  const base = sourcePath === null ? "" : dirname(sourcePath);

  return results.map((entry, index) => {
    const parsed = RunResultSchema.safeParse(entry);
    if (!parsed.success) {
      throw new MalformedParameterError(`run #${index} has no outputs_dir`, {
        path: sourcePath,
        index,
        issues: parsed.error.issues,
      });
    }
    const outputsDir = parsed.data.outputs_dir;
    return isAbsolute(outputsDir) ? outputsDir : join(base, outputsDir);
  });
}

/**
 * Feeds one file's runs into the shared aggregate and returns it. The first
 * call of a run creates the aggregate; later calls merge into the same one.
 */
export function extractRunStatistics<A extends StatisticsAggregator>(
  results: readonly unknown[],
  context: ExtractionContext<A>,
): A {
  const { experimentType, logger } = context;
  switch (experimentType.kind) {
    case "mininet": {
      const dirs = resolveOutputDirectories(results, context.sourcePath, logger);
      logger.debug("outputs_dirs_resolved", { path: context.sourcePath, count: dirs.length });
      return context.accumulator.absorb(dirs, context.parameters);
    }
    case "networkx":
      throw new UnsupportedExperimentTypeError(experimentType.kind);
    case "unknown":
      logger.error("unrecognised_experiment_type", { experimentType: experimentType.value });
      throw new UnrecognisedExperimentTypeError(experimentType.value);
  }
}
