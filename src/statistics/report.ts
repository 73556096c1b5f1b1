import type { RunCatalogue } from "./catalogue.js";
import type { CoordinatorResult } from "./coordinator.js";
import { experimentTypeLabel, type NormalizedParameters, type ParameterValue } from "./types.js";

function formatParameterValue(value: ParameterValue): string {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "boolean":
      return String(value);
    default:
      return JSON.stringify(value);
  }
}

/** Renders a parameter set as sorted `key=value` pairs. */
export function formatParameters(parameters: NormalizedParameters): string {
  return Object.keys(parameters)
    .sort()
    .map((key) => `${key}=${formatParameterValue(parameters[key])}`)
    .join(" ");
}

/** One line per parameter set followed by the totals. */
export function formatCatalogueReport(catalogue: RunCatalogue): string[] {
  const groups = catalogue.groups();
  const lines = groups.map((group) => `${formatParameters(group.parameters)} | runs=${group.outputsDirs.length}`);
  lines.push(
    `total: ${catalogue.runs().length} runs in ${groups.length} parameter sets from ${catalogue.batchCount} result files`,
  );
  return lines;
}

/** Human-readable summary printed by the CLI once a run completes. */
export function formatRunSummary(result: CoordinatorResult<RunCatalogue>): string[] {
  const lines = [`parsed ${result.parsedFiles.length} result files, skipped ${result.skippedFiles.length}`];
  for (const skipped of result.skippedFiles) {
    lines.push(`  skipped ${skipped.path} (${skipped.reason})`);
  }
  if (result.aggregate === null) {
    lines.push("no result files parsed");
    return lines;
  }
  if (result.experimentType !== null) {
    lines.push(`experiment type: ${experimentTypeLabel(result.experimentType)}`);
  }
  lines.push(...formatCatalogueReport(result.aggregate));
  return lines;
}
