import type { StructuredLogger } from "../logger.js";
import { StatisticsAccumulator, type StatisticsAggregator, type StatisticsAggregatorFactory } from "./aggregator.js";
import { enumerateResultSources, type ResultSourceSelection } from "./enumerator.js";
import { ExperimentTypeMismatchError } from "./errors.js";
import { extractRunStatistics } from "./extractor.js";
import { loadResultFile, type SkipReason } from "./loader.js";
import { normaliseParameters } from "./parameters.js";
import { ResultDocumentSchema } from "./schemas.js";
import { decodeExperimentType, experimentTypeLabel, type ExperimentType } from "./types.js";

export interface CoordinatorOptions<A extends StatisticsAggregator> {
  readonly selection: ResultSourceSelection;
  readonly aggregatorFactory: StatisticsAggregatorFactory<A>;
  readonly logger: StructuredLogger;
  /** Opt-in lexicographic order for directory entries. */
  readonly sortEntries?: boolean;
}

export interface SkippedFile {
  readonly path: string;
  readonly reason: SkipReason;
  readonly detail: string;
}

export interface CoordinatorResult<A extends StatisticsAggregator> {
  /** Shared aggregate, `null` when no file was parsed. */
  readonly aggregate: A | null;
  readonly experimentType: ExperimentType | null;
  readonly parsedFiles: readonly string[];
  readonly skippedFiles: readonly SkippedFile[];
}

/**
 * Drives one statistics run: walks the selected directories or files in order
 * and funnels every parsed result file into a single aggregate. Undecodable or
 * incomplete files are skipped; every other failure aborts the run.
 */
export class ExperimentRunCoordinator<A extends StatisticsAggregator = StatisticsAggregator> {
  private readonly selection: ResultSourceSelection;
  private readonly logger: StructuredLogger;
  private readonly sortEntries: boolean;
  private readonly accumulator: StatisticsAccumulator<A>;
  private experimentType: ExperimentType | null = null;
  private readonly parsedFiles: string[] = [];
  private readonly skippedFiles: SkippedFile[] = [];

  constructor(options: CoordinatorOptions<A>) {
    this.selection = options.selection;
    this.logger = options.logger;
    this.sortEntries = options.sortEntries ?? false;
    this.accumulator = new StatisticsAccumulator(options.aggregatorFactory);
  }

  /** Aggregate accumulated so far. */
  get stats(): A | null {
    return this.accumulator.current;
  }

  /** Experiment type recorded from the first parsed file, if any. */
  get observedExperimentType(): ExperimentType | null {
    return this.experimentType;
  }

  async run(): Promise<CoordinatorResult<A>> {
    const sources = enumerateResultSources(this.selection, {
      sortEntries: this.sortEntries,
      onDirectory: (directory) => this.logger.debug("parsing_dir", { directory }),
    });
    for await (const source of sources) {
      await this.parseFile(source.path);
    }
    return {
      aggregate: this.accumulator.current,
      experimentType: this.experimentType,
      parsedFiles: [...this.parsedFiles],
      skippedFiles: [...this.skippedFiles],
    };
  }

  /**
   * Processes one result file and returns the shared aggregate, or `null`
   * when the file was skipped.
   */
  async parseFile(path: string): Promise<A | null> {
    this.logger.debug("parsing_file", { path });

    const outcome = await loadResultFile(path, this.logger);
    if (outcome.status === "skipped") {
      this.skippedFiles.push({ path, reason: outcome.reason, detail: outcome.detail });
      return null;
    }

    const document = ResultDocumentSchema.safeParse(outcome.document);
    if (!document.success) {
      const detail = document.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
      this.logger.debug("result_file_skipped", { path, reason: "missing_sections", detail });
      this.skippedFiles.push({ path, reason: "missing_sections", detail });
      return null;
    }

    const { params, results } = document.data;
    const experimentType = decodeExperimentType(params.experiment_type);
    this.recordExperimentType(experimentType, path);

    const parameters = normaliseParameters(params, experimentType, this.logger);
    const aggregate = extractRunStatistics(results, {
      sourcePath: path,
      experimentType,
      parameters,
      accumulator: this.accumulator,
      logger: this.logger,
    });

    this.recordStats(aggregate, path);
    this.parsedFiles.push(path);
    return aggregate;
  }

  /** Records the run's experiment type; files of a different type abort the run. */
  private recordExperimentType(experimentType: ExperimentType, path: string): void {
    const current = this.experimentType;
    if (current !== null && experimentTypeLabel(current) !== experimentTypeLabel(experimentType)) {
      throw new ExperimentTypeMismatchError(experimentTypeLabel(current), experimentTypeLabel(experimentType), path);
    }
    this.experimentType = experimentType;
  }

  /**
   * Hook invoked once a file has been merged. The shared aggregate already
   * holds everything, so nothing is recorded per file yet; subclasses may
   * track provenance here.
   */
  protected recordStats(_aggregate: A, _path: string): void {}
}
