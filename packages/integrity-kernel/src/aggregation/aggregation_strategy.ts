// Integrity Kernel - LoopAggregator
//
// Architecture tags resolve to aggregation strategies through a registry. Only
// `series` ships: any component failure fails the loop, so rates and
// probabilities add. Voting architectures plug in by registering another tag.

import type { ComponentIntegrityV1, IntegrityMetricV1 } from "@siltime/contracts";
import { ConfigError } from "../errors/integrity_errors";
import type { DemandMode } from "../model/types";

export type LoopAggregate = {
  readonly metric: IntegrityMetricV1;
  // Aggregated PFDavg (low demand) or PFH (high demand).
  readonly value: number;
  readonly loop_hazard_per_h: number;
};

export interface AggregationStrategy {
  readonly architecture: string;
  aggregate(results: ReadonlyArray<ComponentIntegrityV1>, demandMode: DemandMode): LoopAggregate;
}

/**
 * Sums in ascending order with Neumaier compensation. The ordering makes the
 * total independent of how the inputs were listed, bit for bit.
 */
export function compensatedSum(values: ReadonlyArray<number>): number {
  const sorted = [...values].sort((x, y) => x - y);
  let sum = 0;
  let compensation = 0;
  for (const v of sorted) {
    const t = sum + v;
    compensation += Math.abs(sum) >= Math.abs(v) ? sum - t + v : v - t + sum;
    sum = t;
  }
  return sum + compensation;
}

export function metricForDemandMode(mode: DemandMode): IntegrityMetricV1 {
  return mode === "low" ? "PFDavg" : "PFH";
}

function componentMetric(result: ComponentIntegrityV1, mode: DemandMode): number {
  const v = mode === "low" ? result.pfd_avg : result.pfh;
  if (v === null) {
    throw new ConfigError(
      "LOOP_DEMAND_MODE_MIXED",
      `component is ${result.demand_mode}-demand inside a ${mode}-demand loop`,
      result.component_id
    );
  }
  return v;
}

export const SERIES_STRATEGY: AggregationStrategy = Object.freeze({
  architecture: "series",
  aggregate(results: ReadonlyArray<ComponentIntegrityV1>, demandMode: DemandMode): LoopAggregate {
    return {
      metric: metricForDemandMode(demandMode),
      value: compensatedSum(results.map((r) => componentMetric(r, demandMode))),
      loop_hazard_per_h: compensatedSum(results.map((r) => r.hazard_per_h))
    };
  }
});

export class AggregationRegistry {
  private readonly strategies = new Map<string, AggregationStrategy>();

  constructor(strategies: ReadonlyArray<AggregationStrategy> = []) {
    for (const s of strategies) this.register(s);
  }

  register(strategy: AggregationStrategy): this {
    if (this.strategies.has(strategy.architecture)) {
      throw new ConfigError("ARCHITECTURE_ALREADY_REGISTERED", `architecture ${strategy.architecture} is already registered`);
    }
    this.strategies.set(strategy.architecture, strategy);
    return this;
  }

  resolve(architecture: string): AggregationStrategy {
    const s = this.strategies.get(architecture);
    if (!s) {
      throw new ConfigError("UNKNOWN_ARCHITECTURE", `no aggregation strategy for architecture "${architecture}"`, null, {
        architecture,
        known: this.architectures()
      });
    }
    return s;
  }

  architectures(): string[] {
    return [...this.strategies.keys()].sort();
  }
}

export function defaultAggregationRegistry(): AggregationRegistry {
  return new AggregationRegistry([SERIES_STRATEGY]);
}
