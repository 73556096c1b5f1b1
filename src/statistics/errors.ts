/**
 * Canonical taxonomy of the fatal failures raised by the statistics pipeline.
 * Soft conditions (undecodable or incomplete result files) never surface as
 * errors: the coordinator logs and skips them.
 */
export const STATISTICS_ERROR_TAXONOMY = {
  MALFORMED_INPUT: { code: "E-STATS-MALFORMED", message: "Malformed result file input" },
  UNSUPPORTED_TYPE: { code: "E-STATS-UNSUPPORTED", message: "Experiment type not supported" },
  UNRECOGNISED_TYPE: { code: "E-STATS-UNRECOGNISED", message: "Unrecognised experiment type" },
  TYPE_MISMATCH: { code: "E-STATS-TYPE-MISMATCH", message: "Experiment type changed between parsed files" },
  CONFIGURATION: { code: "E-STATS-CONFIG", message: "Invalid statistics configuration" },
  AGGREGATE_STATE: { code: "E-STATS-AGGREGATE-STATE", message: "Statistics aggregate used out of order" },
} as const;

export type StatisticsErrorCategory = keyof typeof STATISTICS_ERROR_TAXONOMY;

export type StatisticsErrorCode = (typeof STATISTICS_ERROR_TAXONOMY)[StatisticsErrorCategory]["code"];

/** Base class shared by every fatal pipeline error. */
export class StatisticsError extends Error {
  public readonly category: StatisticsErrorCategory;
  public readonly code: StatisticsErrorCode;
  /** Structured metadata exposed to loggers. */
  public readonly details: Record<string, unknown>;

  constructor(category: StatisticsErrorCategory, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "StatisticsError";
    this.category = category;
    this.code = STATISTICS_ERROR_TAXONOMY[category].code;
    this.details = details;
  }
}

/** Producer-side format violation (failure model, topology, run entries...). */
export class MalformedParameterError extends StatisticsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("MALFORMED_INPUT", message, details);
    this.name = "MalformedParameterError";
  }
}

/** Raised when a known experiment type has no parsing branch yet. */
export class UnsupportedExperimentTypeError extends StatisticsError {
  public readonly experimentType: string;

  constructor(experimentType: string) {
    super("UNSUPPORTED_TYPE", `${experimentType} parsing not supported yet`, { experimentType });
    this.name = "UnsupportedExperimentTypeError";
    this.experimentType = experimentType;
  }
}

/** Raised for experiment types outside the known enumeration; aborts the process. */
export class UnrecognisedExperimentTypeError extends StatisticsError {
  public readonly experimentType: string;

  constructor(experimentType: string) {
    super("UNRECOGNISED_TYPE", `unrecognised experiment type '${experimentType}'`, { experimentType });
    this.name = "UnrecognisedExperimentTypeError";
    this.experimentType = experimentType;
  }
}

export class ExperimentTypeMismatchError extends StatisticsError {
  constructor(expected: string, received: string, path: string) {
    super(
      "TYPE_MISMATCH",
      `experiment type changed between parsed files: expected '${expected}', '${path}' is '${received}'`,
      { expected, received, path },
    );
    this.name = "ExperimentTypeMismatchError";
  }
}

export class ConfigurationError extends StatisticsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFIGURATION", message, details);
    this.name = "ConfigurationError";
  }
}

/** The run's aggregate was created twice or merged into before it existed. */
export class AggregateStateError extends StatisticsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("AGGREGATE_STATE", message, details);
    this.name = "AggregateStateError";
  }
}
