import { AggregateStateError } from "./errors.js";
import type { NormalizedParameters } from "./types.js";

/**
 * Narrow surface of the statistics aggregator driven by the pipeline. The
 * aggregator parses each run's outputs directory itself; the pipeline only
 * hands over where those directories are and which parameters produced them.
 */
export interface StatisticsAggregator {
  /** Parses additional output directories into the existing statistics. */
  merge(dirs: readonly string[], parameters: NormalizedParameters): void;
}

/** Builds the aggregator from the first batch of output directories. */
export interface StatisticsAggregatorFactory<A extends StatisticsAggregator = StatisticsAggregator> {
  create(dirs: readonly string[], parameters: NormalizedParameters): A;
}

/**
 * Holds the single aggregate of a run. The first batch creates it through the
 * factory, every later batch merges into that same instance.
 */
export class StatisticsAccumulator<A extends StatisticsAggregator = StatisticsAggregator> {
  private readonly factory: StatisticsAggregatorFactory<A>;
  private aggregate: A | null = null;

  constructor(factory: StatisticsAggregatorFactory<A>) {
    this.factory = factory;
  }

  /** Aggregate built so far, `null` until a batch has been absorbed. */
  get current(): A | null {
    return this.aggregate;
  }

  create(dirs: readonly string[], parameters: NormalizedParameters): A {
    if (this.aggregate !== null) {
      throw new AggregateStateError("statistics aggregate already created for this run", { dirs: [...dirs] });
    }
    this.aggregate = this.factory.create(dirs, parameters);
    return this.aggregate;
  }

  merge(dirs: readonly string[], parameters: NormalizedParameters): A {
    if (this.aggregate === null) {
      throw new AggregateStateError("cannot merge before the statistics aggregate exists", { dirs: [...dirs] });
    }
    this.aggregate.merge(dirs, parameters);
    return this.aggregate;
  }

  /** Creates the aggregate on the first batch and merges every later one. */
  absorb(dirs: readonly string[], parameters: NormalizedParameters): A {
    return this.aggregate === null ? this.create(dirs, parameters) : this.merge(dirs, parameters);
  }
}
