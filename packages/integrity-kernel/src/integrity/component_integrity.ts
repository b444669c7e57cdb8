// Integrity Kernel - ComponentIntegrityCalculator
//
// One component at one query time:
//   λ(t), Λ(0, t), R(t), F(t)
//   low demand  -> PFDavg over the proof-test interval holding t, cut at the
//                  mission time
//   high demand -> PFH(t) = λ(t)
//
// A NumericalError earns exactly one retry with relaxed quadrature; a second
// failure (or a deadline expiry) propagates, attributed to the component.

import type { ComponentIntegrityV1, PfdApproximationCheckV1 } from "@siltime/contracts";
import { ConfigError, NumericalError, isIntegrityError } from "../errors/integrity_errors";
import { hazardRateAt } from "../hazard/compute_hazard";
import { GuardCollector } from "../hazard/signal_guards";
import type { Component } from "../model/types";
import { type EngineOptions, relaxedQuadrature } from "../options/engine_options";
import {
  type IncrementalCumulativeHazard,
  type IntegrationContext,
  cumulativeHazard,
  reliabilityFromCumulativeHazard
} from "../reliability/cumulative_hazard";
import type { QuadratureOptions } from "../reliability/quadrature";
import { checkPfdApproximation, pfdAvgApproximate, pfdAvgExact, proofTestWindow, windowLength } from "./pfd_avg";

type LowDemandIntegrity = {
  pfd_avg: number;
  pfd_method: "exact" | "approx";
  approximation_check: PfdApproximationCheckV1;
};

/**
 * @param running optional per-component Λ cache; trajectories pass one so
 *   successive points extend the same integral.
 */
export function computeComponentIntegrity(
  component: Component,
  t: number,
  options: EngineOptions,
  running?: IncrementalCumulativeHazard
): ComponentIntegrityV1 {
  try {
    return attempt(component, t, options, options.quadrature, false, running);
  } catch (err) {
    if (!(err instanceof NumericalError) || !err.retryable) throw attribute(err, component.component_id);
  }

  try {
    return attempt(component, t, options, relaxedQuadrature(options), true, running);
  } catch (err) {
    throw attribute(err, component.component_id);
  }
}

function attempt(
  component: Component,
  t: number,
  options: EngineOptions,
  quadrature: QuadratureOptions,
  numericalRetry: boolean,
  running: IncrementalCumulativeHazard | undefined
): ComponentIntegrityV1 {
  // Guards are collected per attempt so a failed first pass leaves no trace.
  const collector = new GuardCollector(component.component_id);
  const ctx: IntegrationContext = {
    quadrature,
    guards: options.guards,
    collector,
    cancellation: options.cancellation
  };

  const hazard_per_h = hazardRateAt(component, t, options.guards, collector);
  const lambdaCum = running ? running.at(t, ctx) : cumulativeHazard(component, 0, t, ctx);
  const point = reliabilityFromCumulativeHazard(t, lambdaCum);

  const low: LowDemandIntegrity | null = component.demand_mode === "low" ? lowDemand(component, t, hazard_per_h, ctx, options) : null;

  return Object.freeze({
    component_id: component.component_id,
    demand_mode: component.demand_mode,
    hazard_per_h,
    cumulative_hazard: point.cumulative_hazard,
    reliability: point.reliability,
    unreliability: point.unreliability,
    reliability_floored: point.reliability_floored,
    pfd_avg: low ? low.pfd_avg : null,
    pfh: component.demand_mode === "high" ? hazard_per_h : null,
    pfd_method: low ? low.pfd_method : null,
    approximation_check: low ? low.approximation_check : null,
    guards: [...collector.snapshot()],
    numerical_retry: numericalRetry
  });
}

function lowDemand(
  component: Component,
  t: number,
  hazardPerH: number,
  ctx: IntegrationContext,
  options: EngineOptions
): LowDemandIntegrity {
  const window = proofTestWindow(t, component.proof_test_interval_h, component.mission_time_h);
  const L = windowLength(window);
  const check = checkPfdApproximation(component, window, ctx, options.approximation);

  switch (options.pfd_method) {
    case "approx":
      if (!check.valid) {
        throw new ConfigError(
          "PFD_APPROXIMATION_PRECONDITION_FAILED",
          `λ·T/2 is not applicable on [${window.start_h}, ${window.end_h}]h (relative change ${check.relative_change}, λ·T ${check.hazard_interval_product})`,
          component.component_id,
          { ...check }
        );
      }
      return { pfd_avg: pfdAvgApproximate(hazardPerH, L), pfd_method: "approx", approximation_check: check };
    case "auto":
      if (check.valid) {
        return { pfd_avg: pfdAvgApproximate(hazardPerH, L), pfd_method: "approx", approximation_check: check };
      }
      return { pfd_avg: pfdAvgExact(component, window, ctx), pfd_method: "exact", approximation_check: check };
    case "exact":
      return { pfd_avg: pfdAvgExact(component, window, ctx), pfd_method: "exact", approximation_check: check };
    default: {
      const _never: never = options.pfd_method;
      throw new ConfigError("PFD_METHOD_INVALID", `unknown pfd_method ${String(_never)}`, component.component_id);
    }
  }
}

function attribute(err: unknown, componentId: string): unknown {
  return isIntegrityError(err) ? err.withComponent(componentId) : err;
}
