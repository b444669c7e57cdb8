// Integrity Kernel - PFDavg (low demand)
//
// Proof tests at kT restore the component, so the failure probability that
// matters at t accumulates from the start of the proof-test interval holding t.
// Intervals are (kT, (k+1)T]; t = 0 belongs to the first one.
//
// Signals are defined only up to the component's mission time, so a window
// holding t ≤ mission ends at min(start + T, mission) and the average runs over
// that length L. Past the mission time the window keeps its full length.
//
//   exact:   PFDavg = (1/L)·∫ [1 − exp(−∫ λ(τ) dτ over [start, u])] du over [start, start + L]
//   approx:  PFDavg ≈ λ(t)·L/2
//
// The approximation holds only while λ is nearly constant across the interval
// and λ·T is small (1 − e^−x ≈ x). Both conditions are checked explicitly by
// checkPfdApproximation; the approximation is never picked without that check.

import type { PfdApproximationCheckV1 } from "@siltime/contracts";
import { hazardRateAt } from "../hazard/compute_hazard";
import type { Component } from "../model/types";
import type { ApproximationOptions } from "../options/engine_options";
import { cumulativeHazard, type IntegrationContext } from "../reliability/cumulative_hazard";
import { integrate } from "../reliability/quadrature";

export type ProofTestWindow = {
  readonly start_h: number;
  readonly end_h: number;
};

export function proofTestWindow(t: number, proofTestIntervalH: number, horizonH: number = Number.POSITIVE_INFINITY): ProofTestWindow {
  const k = t <= 0 ? 0 : Math.ceil(t / proofTestIntervalH) - 1;
  const start_h = k * proofTestIntervalH;
  const full = start_h + proofTestIntervalH;
  return { start_h, end_h: t <= horizonH ? Math.min(full, horizonH) : full };
}

export function windowLength(window: ProofTestWindow): number {
  return window.end_h - window.start_h;
}

export function pfdAvgApproximate(hazardPerH: number, windowLengthH: number): number {
  return (hazardPerH * windowLengthH) / 2;
}

export function pfdAvgExact(component: Component, window: ProofTestWindow, ctx: IntegrationContext): number {
  const T = windowLength(window);
  // −expm1(−Λ) keeps precision where Λ is tiny and 1 − exp(−Λ) would cancel.
  const unavailability = (u: number): number => -Math.expm1(-cumulativeHazard(component, window.start_h, u, ctx));
  const outer = integrate(unavailability, window.start_h, window.end_h, ctx.quadrature, ctx.cancellation);
  return Math.max(0, outer.value / T);
}

/**
 * Samples λ at `samples + 1` evenly spaced points across the window.
 *
 * The samples reach past t up to the window end, so a guard that fires only
 * later in the window is recorded on the result for t: PFDavg at t averages
 * over the whole window.
 */
export function checkPfdApproximation(
  component: Component,
  window: ProofTestWindow,
  ctx: IntegrationContext,
  options: ApproximationOptions
): PfdApproximationCheckV1 {
  const T = windowLength(window);
  let min = Number.POSITIVE_INFINITY;
  let max = 0;
  for (let i = 0; i <= options.samples; i++) {
    const tau = i === options.samples ? window.end_h : window.start_h + (i * T) / options.samples;
    const rate = hazardRateAt(component, tau, ctx.guards, ctx.collector);
    if (rate < min) min = rate;
    if (rate > max) max = rate;
  }

  const relative_change = max > 0 ? (max - min) / max : 0;
  const hazard_interval_product = max * T;
  return {
    valid: relative_change <= options.max_relative_change && hazard_interval_product <= options.max_hazard_interval_product,
    window_start_h: window.start_h,
    window_end_h: window.end_h,
    relative_change,
    hazard_interval_product
  };
}
