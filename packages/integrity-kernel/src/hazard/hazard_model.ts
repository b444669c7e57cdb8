// Integrity Kernel - hazard rate strategies
//
// A HazardRateModel turns the degradation snapshot at t into λ(t) in 1/hour.
// Strategies are swappable per component; callers only ever go through
// computeHazardRate (hazard/compute_hazard.ts), which reads and guards the
// signals first.

import type { HazardModelSpecV1 } from "@siltime/contracts";
import { ConfigError } from "../errors/integrity_errors";
import type { DegradationSnapshot } from "../signals/degradation_signals";

export type HazardInput = {
  readonly t_h: number;
  readonly baseline_hazard_per_h: number;
  readonly signals: DegradationSnapshot;
};

/**
 * Strategy interface. `evaluate` must be pure and return a nonnegative rate.
 */
export interface HazardRateModel {
  readonly kind: string;
  evaluate(input: HazardInput): number;
}

/**
 * Illustrative multiplicative model:
 *
 *   λ = λ0 · env · stress / mq · (1 + a·age) · (1 + c·cycles) · (1 − dc)
 *
 * The (1 − dc) factor leaves only failures the online diagnostics do not detect.
 * With env = stress = mq = 1, dc = 0 and zero coefficients, λ = λ0.
 */
export class MultiplicativeHazardModel implements HazardRateModel {
  public readonly kind = "multiplicative";

  constructor(
    public readonly agingCoefficientPerH: number = 0,
    public readonly cycleCoefficient: number = 0
  ) {
    if (!(agingCoefficientPerH >= 0) || !(cycleCoefficient >= 0)) {
      throw new ConfigError("HAZARD_MODEL_INVALID", "multiplicative coefficients must be nonnegative");
    }
  }

  evaluate({ baseline_hazard_per_h, signals }: HazardInput): number {
    const aging = 1 + this.agingCoefficientPerH * signals.age_h;
    const cycling = 1 + this.cycleCoefficient * signals.cycle_count;
    return (
      ((baseline_hazard_per_h * signals.environment_factor * signals.stress_factor) / signals.maintenance_quality) *
      aging *
      cycling *
      (1 - signals.diagnostic_coverage)
    );
  }
}

/**
 * Weibull wear-out model driven by component age:
 *
 *   λ = (β/η)·(age/η)^(β−1) · env · stress / mq · (1 − dc)
 *
 * β < 1 would make λ unbounded at age 0, so only β ≥ 1 is admitted.
 * The component baseline is not used.
 */
export class WeibullHazardModel implements HazardRateModel {
  public readonly kind = "weibull";

  constructor(
    public readonly beta: number,
    public readonly etaH: number
  ) {
    if (!Number.isFinite(beta) || beta < 1) {
      throw new ConfigError("HAZARD_MODEL_INVALID", `weibull beta must be >= 1 (got ${beta})`);
    }
    if (!Number.isFinite(etaH) || etaH <= 0) {
      throw new ConfigError("HAZARD_MODEL_INVALID", `weibull eta_h must be > 0 (got ${etaH})`);
    }
  }

  evaluate({ signals }: HazardInput): number {
    const age = Math.max(0, signals.age_h);
    const wearOut = (this.beta / this.etaH) * Math.pow(age / this.etaH, this.beta - 1);
    return (
      ((wearOut * signals.environment_factor * signals.stress_factor) / signals.maintenance_quality) *
      (1 - signals.diagnostic_coverage)
    );
  }
}

/**
 * Builds the strategy named by a contract spec.
 */
export function createHazardModel(spec: HazardModelSpecV1): HazardRateModel {
  switch (spec.kind) {
    case "multiplicative":
      return new MultiplicativeHazardModel(spec.aging_coefficient_per_h, spec.cycle_coefficient);
    case "weibull":
      return new WeibullHazardModel(spec.beta, spec.eta_h);
    default: {
      const _never: never = spec;
      throw new ConfigError("HAZARD_MODEL_UNKNOWN", `unknown hazard model ${String(_never)}`);
    }
  }
}
