import { readBool, readOptionalString, STATS_ENV } from "../config/env.js";
import { StructuredLogger } from "../logger.js";
import { runCatalogueFactory, type RunCatalogue } from "./catalogue.js";
import type { CoordinatorResult } from "./coordinator.js";
import { ConfigurationError, StatisticsError } from "./errors.js";
import { parseVerbosity, runStatisticsPipeline } from "./pipeline.js";
import { formatRunSummary } from "./report.js";

/** CLI flags recognised by `scripts/parseStatistics.ts`. */
export interface StatisticsCliOptions {
  /** Directories whose result files are parsed (`--dirs`/`-d`). */
  dirs?: string[];
  /** Explicit result files (`--files`/`-f`); `results.json` when neither flag is given. */
  files?: string[];
  /** Verbosity (`--debug`/`--verbose`/`-v`); the bare flag means `debug`. */
  verbosity?: string;
  /** Sort directory entries before parsing (`--sort`). */
  sortEntries?: boolean;
  /** Mirror structured logs to this file (`--log-file`). */
  logFile?: string;
}

/** Lightweight logger abstraction used to surface console output. */
export interface StatisticsCliLogger {
  log: (...args: unknown[]) => void;
}

export interface StatisticsCliOverrides {
  /** Destination of the structured diagnostics. Defaults to stderr. */
  readonly sink?: (line: string) => void;
}

export interface StatisticsCliResult {
  readonly result: CoordinatorResult<RunCatalogue>;
  /** Lines forwarded to the CLI logger. */
  readonly summary: readonly string[];
}

const DIRS_FLAGS = new Set(["--dirs", "-d"]);
const FILES_FLAGS = new Set(["--files", "-f"]);
const VERBOSITY_FLAGS = new Set(["--debug", "--verbose", "-v"]);

function isFlag(token: string): boolean {
  return token.startsWith("-");
}

/** Consumes the values following a multi-value flag up to the next flag. */
function collectValues(argv: readonly string[], start: number): string[] {
  const values: string[] = [];
  for (let index = start; index < argv.length && !isFlag(argv[index]); index += 1) {
    values.push(argv[index]);
  }
  return values;
}

/** Parses CLI arguments; unknown flags and combined `--dirs`/`--files` are rejected. */
export function parseStatisticsCliOptions(argv: readonly string[]): StatisticsCliOptions {
  const options: StatisticsCliOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (DIRS_FLAGS.has(token) || FILES_FLAGS.has(token)) {
      const values = collectValues(argv, index + 1);
      if (values.length === 0) {
        throw new ConfigurationError(`${token} expects at least one path`);
      }
      index += values.length;
      if (DIRS_FLAGS.has(token)) {
        options.dirs = values;
      } else {
        options.files = values;
      }
    } else if (VERBOSITY_FLAGS.has(token)) {
      const next = argv[index + 1];
      if (next !== undefined && !isFlag(next)) {
        options.verbosity = next;
        index += 1;
      } else {
        options.verbosity = "debug";
      }
    } else if (token === "--sort") {
      options.sortEntries = true;
    } else if (token === "--log-file" && index + 1 < argv.length) {
      options.logFile = argv[index + 1];
      index += 1;
    } else {
      throw new ConfigurationError(`unexpected argument '${token}'`);
    }
  }

  if (options.dirs !== undefined && options.files !== undefined) {
    throw new ConfigurationError("--dirs and --files are mutually exclusive");
  }
  return options;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof StatisticsError) {
    return { name: error.name, code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

/**
 * Executes a statistics run with CLI semantics: flags win over `STATS_*`
 * environment variables, diagnostics go to the structured logger and the
 * summary goes to {@link logger}.
 */
export async function executeStatisticsCli(
  options: StatisticsCliOptions,
  env: NodeJS.ProcessEnv,
  logger: StatisticsCliLogger,
  overrides: StatisticsCliOverrides = {},
): Promise<StatisticsCliResult> {
  // An invalid STATS_LOG_LEVEL is rejected even when a flag overrides it.
  const envVerbosity = readOptionalString(STATS_ENV.logLevel, env);
  const defaultLevel = envVerbosity === undefined ? "info" : parseVerbosity(envVerbosity);
  const structured = new StructuredLogger({
    minLevel: options.verbosity === undefined ? defaultLevel : parseVerbosity(options.verbosity),
    logFile: options.logFile ?? readOptionalString(STATS_ENV.logFile, env) ?? null,
    sink: overrides.sink ?? ((line) => void process.stderr.write(line)),
  });

  try {
    const result = await runStatisticsPipeline({
      dirs: options.dirs,
      files: options.files,
      logger: structured,
      sortEntries: options.sortEntries ?? readBool(STATS_ENV.sortEntries, false, env),
      aggregatorFactory: runCatalogueFactory,
    });
    const summary = formatRunSummary(result);
    for (const line of summary) {
      logger.log(line);
    }
    return { result, summary };
  } catch (error) {
    structured.error("statistics_run_failed", describeError(error));
    throw error;
  } finally {
    await structured.flush();
  }
}
