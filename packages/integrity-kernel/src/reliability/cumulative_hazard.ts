// Integrity Kernel - ReliabilityIntegrator
//
//   Λ(t0, t1) = ∫ λ(τ) dτ over [t0, t1]
//   R(t)      = exp(−Λ(0, t))
//   F(t)      = 1 − R(t)

import { hazardRateAt } from "../hazard/compute_hazard";
import type { GuardCollector } from "../hazard/signal_guards";
import type { Component } from "../model/types";
import type { CancellationToken } from "../options/cancellation";
import type { GuardOptions } from "../options/engine_options";
import { integrate, type QuadratureOptions } from "./quadrature";

export type IntegrationContext = {
  readonly quadrature: QuadratureOptions;
  readonly guards: GuardOptions;
  readonly collector: GuardCollector;
  readonly cancellation?: CancellationToken;
};

export type ReliabilityPoint = {
  readonly t_h: number;
  readonly cumulative_hazard: number;
  readonly reliability: number;
  readonly unreliability: number;
  // exp(−Λ) underflowed; reliability holds the smallest positive double instead.
  readonly reliability_floored: boolean;
};

export function cumulativeHazard(component: Component, t0: number, t1: number, ctx: IntegrationContext): number {
  const r = integrate((tau) => hazardRateAt(component, tau, ctx.guards, ctx.collector), t0, t1, ctx.quadrature, ctx.cancellation);
  // λ ≥ 0, so a negative total can only be rounding noise around zero.
  return Math.max(0, r.value);
}

/**
 * Turns Λ(0, t) into a reliability point. R stays in (0, 1]: once exp(−Λ)
 * underflows (Λ above ~745) it is floored at Number.MIN_VALUE and flagged, while
 * Λ itself is kept as computed.
 */
export function reliabilityFromCumulativeHazard(t: number, lambdaCum: number): ReliabilityPoint {
  const raw = Math.exp(-lambdaCum);
  const reliability_floored = !(raw > 0);
  const reliability = reliability_floored ? Number.MIN_VALUE : raw;
  return Object.freeze({
    t_h: t,
    cumulative_hazard: lambdaCum,
    reliability,
    unreliability: 1 - reliability,
    reliability_floored
  });
}

export function reliabilityAt(component: Component, t: number, ctx: IntegrationContext): ReliabilityPoint {
  return reliabilityFromCumulativeHazard(t, cumulativeHazard(component, 0, t, ctx));
}

/**
 * Caches the last (t, Λ(0, t)) pair of one component.
 *
 * Assumes queries arrive in nondecreasing t. A query earlier than the cached
 * point integrates afresh from 0 and replaces the cache; the stale value is
 * never reused. The context is passed per call so a relaxed retry can extend
 * the same cache.
 */
export class IncrementalCumulativeHazard {
  private lastT = 0;
  private lastValue = 0;
  private restarts = 0;

  constructor(private readonly component: Component) {}

  at(t: number, ctx: IntegrationContext): number {
    if (t >= this.lastT) {
      this.lastValue += cumulativeHazard(this.component, this.lastT, t, ctx);
    } else {
      this.restarts += 1;
      this.lastValue = cumulativeHazard(this.component, 0, t, ctx);
    }
    this.lastT = t;
    return this.lastValue;
  }

  /** Number of times a backwards query forced a fresh integral from 0. */
  get freshRestarts(): number {
    return this.restarts;
  }

  get cachedPoint(): { readonly t_h: number; readonly cumulative_hazard: number } {
    return { t_h: this.lastT, cumulative_hazard: this.lastValue };
  }
}

/**
 * R(t) over an ascending grid. Extending one running integral keeps the curve
 * non-increasing by construction.
 */
export function reliabilityCurve(component: Component, times: ReadonlyArray<number>, ctx: IntegrationContext): ReadonlyArray<ReliabilityPoint> {
  const sorted = [...times].sort((x, y) => x - y);
  const running = new IncrementalCumulativeHazard(component);
  return Object.freeze(sorted.map((t) => reliabilityFromCumulativeHazard(t, running.at(t, ctx))));
}
