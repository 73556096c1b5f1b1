import type { StatisticsAggregator, StatisticsAggregatorFactory } from "./aggregator.js";
import type { NormalizedParameters } from "./types.js";

/** One run's outputs directory together with the parameters it ran with. */
export interface CatalogueRun {
  readonly outputsDir: string;
  readonly parameters: NormalizedParameters;
  /** Index of the create/merge call that contributed the run. */
  readonly batch: number;
}

/** Runs sharing an identical parameter set. */
export interface CatalogueGroup {
  readonly key: string;
  readonly parameters: NormalizedParameters;
  readonly outputsDirs: readonly string[];
}

/** Stable identity of a parameter set, independent of key order. */
export function parameterKey(parameters: NormalizedParameters): string {
  const entries = Object.keys(parameters)
    .sort()
    .map((key) => [key, parameters[key]]);
  return JSON.stringify(entries);
}

/**
 * Default aggregator recording which outputs directories were merged under
 * which parameters. Metric computation (latency, reachability, cost) belongs
 * to richer aggregators injected through a custom factory.
 */
export class RunCatalogue implements StatisticsAggregator {
  private readonly entries: CatalogueRun[] = [];
  private batches = 0;

  constructor(dirs: readonly string[], parameters: NormalizedParameters) {
    this.merge(dirs, parameters);
  }

  merge(dirs: readonly string[], parameters: NormalizedParameters): void {
    const batch = this.batches;
    this.batches += 1;
    for (const outputsDir of dirs) {
      this.entries.push({ outputsDir, parameters: { ...parameters }, batch });
    }
  }

  /** Number of create/merge calls absorbed so far. */
  get batchCount(): number {
    return this.batches;
  }

  runs(): readonly CatalogueRun[] {
    return this.entries;
  }

  /** Runs grouped by parameter set, groups in first-seen order. */
  groups(): CatalogueGroup[] {
    const grouped = new Map<string, { parameters: NormalizedParameters; outputsDirs: string[] }>();
    for (const run of this.entries) {
      const key = parameterKey(run.parameters);
      const existing = grouped.get(key);
      if (existing) {
        existing.outputsDirs.push(run.outputsDir);
      } else {
        grouped.set(key, { parameters: run.parameters, outputsDirs: [run.outputsDir] });
      }
    }
    return [...grouped.entries()].map(([key, group]) => ({ key, ...group }));
  }
}

export const runCatalogueFactory: StatisticsAggregatorFactory<RunCatalogue> = {
  create: (dirs, parameters) => new RunCatalogue(dirs, parameters),
};
