export { StatisticsAccumulator, type StatisticsAggregator, type StatisticsAggregatorFactory } from "./aggregator.js";
export { RunCatalogue, runCatalogueFactory, parameterKey, type CatalogueGroup, type CatalogueRun } from "./catalogue.js";
export { ExperimentRunCoordinator, type CoordinatorOptions, type CoordinatorResult, type SkippedFile } from "./coordinator.js";
export {
  enumerateResultSources,
  listResultFiles,
  isInProgressFile,
  IN_PROGRESS_SUFFIX,
  type ResultSource,
  type ResultSourceSelection,
} from "./enumerator.js";
export * from "./errors.js";
export { extractRunStatistics, resolveOutputDirectories, type ExtractionContext } from "./extractor.js";
export { loadResultFile, type LoadOutcome, type SkipReason } from "./loader.js";
export { decodeTopo, deriveFailureProbability, normaliseParameters, topoFileName, type Topo } from "./parameters.js";
export {
  DEFAULT_RESULT_FILE,
  parseVerbosity,
  resolveSourceSelection,
  runStatisticsPipeline,
  type PipelineOptions,
} from "./pipeline.js";
export { formatCatalogueReport, formatParameters, formatRunSummary } from "./report.js";
export * from "./types.js";
