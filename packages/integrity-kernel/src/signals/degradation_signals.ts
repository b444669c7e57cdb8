// Integrity Kernel - degradation signal bundle
//
// Every component carries all six signals. Reading them at t produces an
// immutable snapshot or an InputError naming the first signal that is missing,
// undefined or non-finite.

import { DEGRADATION_SIGNAL_NAMES_V1, type DegradationSignalNameV1 } from "@siltime/contracts";
import { InputError } from "../errors/integrity_errors";
import type { TimeSeries } from "./time_series";

export type DegradationSignalName = DegradationSignalNameV1;

export const DEGRADATION_SIGNAL_NAMES: ReadonlyArray<DegradationSignalName> = DEGRADATION_SIGNAL_NAMES_V1;

/**
 * Typed, required-field bundle of degradation signals.
 */
export type DegradationSignals = { readonly [K in DegradationSignalName]: TimeSeries };

/**
 * Values of every degradation signal at one instant.
 */
export type DegradationSnapshot = { readonly [K in DegradationSignalName]: number };

/**
 * Evaluates every signal at t.
 *
 * The bundle is typed as complete, but callers outside TypeScript (or a provider
 * that lost a field) can still hand over a partial object, so presence is checked
 * at runtime too.
 */
export function readSignalsAt(signals: Partial<DegradationSignals>, t: number, componentId: string | null = null): DegradationSnapshot {
  const out: Partial<Record<DegradationSignalName, number>> = {};
  for (const name of DEGRADATION_SIGNAL_NAMES) {
    const series = signals[name];
    if (!series) {
      throw new InputError("SIGNAL_MISSING", `degradation signal ${name} is not provided`, componentId, { signal: name });
    }
    const v = series.evaluate(t);
    if (v === undefined || !Number.isFinite(v)) {
      throw new InputError("SIGNAL_UNDEFINED", `degradation signal ${name} is undefined at t=${t}h`, componentId, {
        signal: name,
        t_h: t
      });
    }
    out[name] = v;
  }
  return Object.freeze({
    age_h: need(out.age_h),
    cycle_count: need(out.cycle_count),
    environment_factor: need(out.environment_factor),
    stress_factor: need(out.stress_factor),
    maintenance_quality: need(out.maintenance_quality),
    diagnostic_coverage: need(out.diagnostic_coverage)
  });
}

function need(v: number | undefined): number {
  // Unreachable after the loop above; keeps the snapshot type exact without a cast.
  if (v === undefined) throw new InputError("SIGNAL_MISSING", "degradation signal missing after read");
  return v;
}
