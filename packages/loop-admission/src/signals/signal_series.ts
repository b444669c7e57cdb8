import type { DegradationSignalNameV1, DegradationSignalsV1, SignalSeriesV1 } from "@siltime/contracts"; // Wire shapes of the signal bundle.
import { type DegradationSignals, InputError, type TimeSeries, constantSeries, sampledSeries } from "@siltime/integrity-kernel"; // Kernel accessors.

export function buildTimeSeries(spec: SignalSeriesV1): TimeSeries {
  switch (spec.kind) {
    case "constant":
      return constantSeries(spec.value);
    case "samples":
      return sampledSeries(spec.samples, spec.extrapolation); // ordering already enforced by the contract refine
    default: {
      const _never: never = spec;
      throw new Error(`unknown signal series ${String(_never)}`);
    }
  }
}

function requireSeries(spec: SignalSeriesV1 | undefined, name: DegradationSignalNameV1, componentId: string): TimeSeries {
  if (!spec) {
    throw new InputError("SIGNAL_MISSING", `degradation signal ${name} is not provided`, componentId, { signal: name }); // a missing signal names the component
  }
  return buildTimeSeries(spec);
}

/**
 * Turns the wire bundle into the kernel's complete, typed bundle. All six
 * signals are required.
 */
export function buildDegradationSignals(specs: DegradationSignalsV1, componentId: string): DegradationSignals {
  return Object.freeze({
    age_h: requireSeries(specs.age_h, "age_h", componentId),
    cycle_count: requireSeries(specs.cycle_count, "cycle_count", componentId),
    environment_factor: requireSeries(specs.environment_factor, "environment_factor", componentId),
    stress_factor: requireSeries(specs.stress_factor, "stress_factor", componentId),
    maintenance_quality: requireSeries(specs.maintenance_quality, "maintenance_quality", componentId),
    diagnostic_coverage: requireSeries(specs.diagnostic_coverage, "diagnostic_coverage", componentId)
  });
}
