/**
 * Shared shapes flowing through the statistics pipeline. Everything decoded
 * from disk enters as `unknown` and is narrowed by the zod schemas in
 * `schemas.ts` before reaching the normaliser or the extractor.
 */

/** Non-null JSON value allowed in a normalised parameter mapping. */
export type ParameterValue =
  | string
  | number
  | boolean
  | readonly unknown[]
  | { readonly [key: string]: unknown };

/** Canonical parameter mapping; never contains `null` or `undefined` values. */
export type NormalizedParameters = Record<string, ParameterValue>;

/** Raw `params` section of a result file, exactly as decoded. */
export type RawParameters = Record<string, unknown>;

/** Decoded `{ params, results }` pair of a result file. */
export interface RawResultDocument {
  readonly params: RawParameters;
  readonly results: readonly unknown[];
}

/** Experiment type literals understood by the pipeline. */
export const KNOWN_EXPERIMENT_TYPES = ["mininet", "networkx"] as const;

export type KnownExperimentType = (typeof KNOWN_EXPERIMENT_TYPES)[number];

/**
 * Experiment type tag dispatched on by the normaliser and the extractor.
 * `unknown` keeps the offending literal so the failure can name it.
 */
export type ExperimentType =
  | { readonly kind: "mininet" }
  | { readonly kind: "networkx" }
  | { readonly kind: "unknown"; readonly value: string };

/** Files produced before the field existed were all networkx simulations. */
export const LEGACY_EXPERIMENT_TYPE: KnownExperimentType = "networkx";

/**
 * Decodes `params.experiment_type`. Only an absent key falls back to
 * {@link LEGACY_EXPERIMENT_TYPE}; `null` and other non-string values are
 * reported as unknown.
 */
export function decodeExperimentType(raw: unknown): ExperimentType {
  if (raw === undefined) {
    return { kind: LEGACY_EXPERIMENT_TYPE };
  }
  if (raw === "mininet" || raw === "networkx") {
    return { kind: raw };
  }
  return { kind: "unknown", value: typeof raw === "string" ? raw : JSON.stringify(raw) };
}

/** Human-readable label of an experiment type. */
export function experimentTypeLabel(type: ExperimentType): string {
  return type.kind === "unknown" ? type.value : type.kind;
}

/** Narrows an arbitrary decoded value to a {@link ParameterValue}. */
export function isParameterValue(value: unknown): value is ParameterValue {
  if (value === null || value === undefined) {
    return false;
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "object":
      return true;
    default:
      return false;
  }
}
