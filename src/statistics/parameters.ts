import type { StructuredLogger } from "../logger.js";
import { MalformedParameterError, UnrecognisedExperimentTypeError, UnsupportedExperimentTypeError } from "./errors.js";
import { TopoSchema } from "./schemas.js";
import {
  experimentTypeLabel,
  isParameterValue,
  type ExperimentType,
  type NormalizedParameters,
  type RawParameters,
} from "./types.js";

/**
 * Topology parameter as written by the producers: a bare file name, or the
 * `[reader, file]` pair older generations stored.
 */
export type Topo =
  | { readonly kind: "named"; readonly file: string }
  | { readonly kind: "reader-and-file"; readonly reader: string; readonly file: string };

/** Decimal literal accepted as a failure probability (`0.25`, `.5`, `1e-3`...). */
const PROBABILITY_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Separator between the failure model name and its probability. */
const FAILURE_MODEL_SEPARATOR = "/";

/** Decodes the raw `topo` value, rejecting every shape but the two known ones. */
export function decodeTopo(value: unknown): Topo {
  const parsed = TopoSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedParameterError("topo must be a file name or a [reader, file] pair", { topo: value });
  }
  const topo = parsed.data;
  if (typeof topo === "string") {
    return { kind: "named", file: topo };
  }
  const [reader, file] = topo;
  return { kind: "reader-and-file", reader, file };
}

export function topoFileName(topo: Topo): string {
  switch (topo.kind) {
    case "named":
    case "reader-and-file":
      return topo.file;
  }
}

/**
 * Extracts the probability from a `<model-name>/<probability>` failure model.
 * Only the uniform model is produced today, so the name itself is discarded.
 */
export function deriveFailureProbability(failureModel: unknown): number {
  if (typeof failureModel !== "string") {
    throw new MalformedParameterError("failure_model must be a '<model>/<probability>' string", {
      failure_model: failureModel,
    });
  }
  const segments = failureModel.split(FAILURE_MODEL_SEPARATOR);
  if (segments.length < 2) {
    throw new MalformedParameterError(`failure_model '${failureModel}' has no '${FAILURE_MODEL_SEPARATOR}' separator`, {
      failure_model: failureModel,
    });
  }
  const literal = segments[1].trim();
  if (!PROBABILITY_LITERAL.test(literal)) {
    throw new MalformedParameterError(`failure_model '${failureModel}' has a non-numeric probability`, {
      failure_model: failureModel,
    });
  }
  return Number.parseFloat(literal);
}

/** Moves `from` to `to`. A missing required key is a producer-side format violation. */
function renameKey(params: Record<string, unknown>, from: string, to: string, required: boolean): void {
  if (!(from in params)) {
    if (required) {
      throw new MalformedParameterError(`missing parameter '${from}'`, { parameter: from });
    }
    return;
  }
  const value = params[from];
  delete params[from];
  params[to] = value;
}

/** Empty-ish values that mean "feature unused" in the producers' settings. */
function isUnset(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === "object" && value !== null && Object.keys(value).length === 0;
}

/** Removes `null`/`undefined` entries; they stand for optional settings left unset. */
function dropNullParameters(params: Record<string, unknown>, logger: StructuredLogger): NormalizedParameters {
  const normalised: NormalizedParameters = {};
  for (const [key, value] of Object.entries(params)) {
    if (isParameterValue(value)) {
      normalised[key] = value;
    } else {
      logger.debug("null_parameter_dropped", { parameter: key });
    }
  }
  return normalised;
}

function applyMininetRules(params: NormalizedParameters): NormalizedParameters {
  renameKey(params, "tree_choosing_heuristic", "select_policy", true);
  // Traffic generation moved to the publishers; the legacy knobs only matter when enabled.
  if (isUnset(params.n_traffic_generators)) {
    delete params.n_traffic_generators;
    delete params.traffic_generator_bandwidth;
  }
  return params;
}

/**
 * Rewrites a raw `params` mapping into the canonical parameter names used
 * when grouping runs. The input is left untouched.
 *
 * Common rules run first (renames, `fprob`, `topo`, null removal); the
 * experiment type then selects the type-specific rules. Networkx files are not
 * supported yet and any other type aborts the run.
 */
export function normaliseParameters(
  raw: RawParameters,
  experimentType: ExperimentType,
  logger: StructuredLogger,
): NormalizedParameters {
  const params: Record<string, unknown> = { ...raw };

  renameKey(params, "heuristic", "const_alg", true);
  renameKey(params, "experiment_type", "exp_type", false);

  params.fprob = deriveFailureProbability(params.failure_model);
  delete params.failure_model;

  params.topo = topoFileName(decodeTopo(params.topo));

  const normalised = dropNullParameters(params, logger);

  switch (experimentType.kind) {
    case "mininet":
      return applyMininetRules(normalised);
    case "networkx":
      throw new UnsupportedExperimentTypeError(experimentType.kind);
    case "unknown":
      logger.error("unrecognised_experiment_type", { experimentType: experimentTypeLabel(experimentType) });
      throw new UnrecognisedExperimentTypeError(experimentType.value);
  }
}
