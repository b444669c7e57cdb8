// Integrity Kernel - HazardRateModel entrypoint
//
// compute(component, t) -> λ: read all signals at t, guard them, hand them to the
// component's strategy, and check what comes back.

import { InputError, NumericalError } from "../errors/integrity_errors";
import type { Component } from "../model/types";
import type { GuardOptions } from "../options/engine_options";
import { readSignalsAt } from "../signals/degradation_signals";
import { GuardCollector, applySignalGuards } from "./signal_guards";

export type HazardEvaluation = {
  readonly hazard_per_h: number;
  readonly guards: GuardCollector;
};

/**
 * λ(t) for one component. Guard events accumulate on `collector`.
 *
 * @throws InputError when a signal is missing/undefined at t or a multiplier is negative.
 * @throws NumericalError when the strategy returns a negative or non-finite rate.
 */
export function hazardRateAt(component: Component, t: number, options: GuardOptions, collector: GuardCollector): number {
  const raw = readSignalsAt(component.signals, t, component.component_id);

  if (raw.environment_factor < 0 || raw.stress_factor < 0) {
    throw new InputError(
      "SIGNAL_OUT_OF_DOMAIN",
      `environment/stress factors must be nonnegative at t=${t}h`,
      component.component_id,
      { t_h: t, environment_factor: raw.environment_factor, stress_factor: raw.stress_factor }
    );
  }

  const guarded = applySignalGuards(raw, t, options, collector);
  const rate = component.hazard_model.evaluate({
    t_h: t,
    baseline_hazard_per_h: component.baseline_hazard_per_h,
    signals: guarded
  });

  if (!Number.isFinite(rate) || rate < 0) {
    throw new NumericalError("HAZARD_RATE_INVALID", `hazard model ${component.hazard_model.kind} returned ${rate} at t=${t}h`, component.component_id, {
      t_h: t
    });
  }
  return rate;
}

/**
 * Single-point convenience: λ(t) with its own guard record.
 */
export function computeHazardRate(component: Component, t: number, options: GuardOptions): HazardEvaluation {
  const guards = new GuardCollector(component.component_id);
  const hazard_per_h = hazardRateAt(component, t, options, guards);
  return { hazard_per_h, guards };
}
