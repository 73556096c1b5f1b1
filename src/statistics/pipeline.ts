import { StructuredLogger, type LogLevel } from "../logger.js";
import type { StatisticsAggregator, StatisticsAggregatorFactory } from "./aggregator.js";
import { ExperimentRunCoordinator, type CoordinatorResult } from "./coordinator.js";
import type { ResultSourceSelection } from "./enumerator.js";
import { ConfigurationError } from "./errors.js";

/** File parsed when neither directories nor files are given. */
export const DEFAULT_RESULT_FILE = "results.json";

/** Verbosity literals accepted on the command line and in the environment. */
export const VERBOSITY_LEVELS = ["debug", "info", "warn", "warning", "error", "critical"] as const;

export type Verbosity = (typeof VERBOSITY_LEVELS)[number];

const VERBOSITY_TO_LEVEL: Record<Verbosity, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
};

/** Maps a verbosity literal (case-insensitive) to the logger threshold. */
export function parseVerbosity(value: string): LogLevel {
  const normalised = value.trim().toLowerCase();
  const match = VERBOSITY_LEVELS.find((level) => level === normalised);
  if (match === undefined) {
    throw new ConfigurationError(`unknown verbosity level '${value}'`, { allowed: [...VERBOSITY_LEVELS] });
  }
  return VERBOSITY_TO_LEVEL[match];
}

export interface SourceInputs {
  readonly dirs?: readonly string[] | undefined;
  readonly files?: readonly string[] | undefined;
}

/** Picks the input mode; directories and files cannot be combined. */
export function resolveSourceSelection(inputs: SourceInputs): ResultSourceSelection {
  if (inputs.dirs !== undefined && inputs.files !== undefined) {
    throw new ConfigurationError("directories and files are mutually exclusive", {
      dirs: [...inputs.dirs],
      files: [...inputs.files],
    });
  }
  if (inputs.dirs !== undefined) {
    return { mode: "dirs", dirs: inputs.dirs };
  }
  return { mode: "files", files: inputs.files ?? [DEFAULT_RESULT_FILE] };
}

export interface PipelineOptions<A extends StatisticsAggregator> extends SourceInputs {
  readonly aggregatorFactory: StatisticsAggregatorFactory<A>;
  /** Ignored when {@link logger} is provided. Defaults to `info`. */
  readonly verbosity?: string;
  /** Ignored when {@link logger} is provided. */
  readonly logFile?: string | null;
  readonly logger?: StructuredLogger;
  readonly sortEntries?: boolean;
}

/**
 * Runs discovery, normalisation and aggregation over the selected inputs and
 * returns the shared aggregate. Fatal conditions propagate to the caller; no
 * partial aggregate is returned in that case.
 */
export async function runStatisticsPipeline<A extends StatisticsAggregator>(
  options: PipelineOptions<A>,
): Promise<CoordinatorResult<A>> {
  const selection = resolveSourceSelection(options);
  const logger =
    options.logger ??
    new StructuredLogger({
      minLevel: parseVerbosity(options.verbosity ?? "info"),
      logFile: options.logFile ?? null,
    });

  logger.info("statistics_run_started", {
    mode: selection.mode,
    inputs: selection.mode === "dirs" ? [...selection.dirs] : [...selection.files],
  });

  const coordinator = new ExperimentRunCoordinator({
    selection,
    aggregatorFactory: options.aggregatorFactory,
    logger,
    sortEntries: options.sortEntries ?? false,
  });
  const result = await coordinator.run();

  logger.info("statistics_run_completed", {
    parsed: result.parsedFiles.length,
    skipped: result.skippedFiles.length,
    experimentType: result.experimentType?.kind ?? null,
  });
  return result;
}
