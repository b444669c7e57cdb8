// HazardRateModel: strategies, signal reads, guards.

import assert from "node:assert";

import { computeHazardRate } from "../hazard/compute_hazard";
import { MultiplicativeHazardModel, createHazardModel } from "../hazard/hazard_model";
import { DEFAULT_ENGINE_OPTIONS } from "../options/engine_options";
import { readSignalsAt } from "../signals/degradation_signals";
import { constantSeries, sampledSeries } from "../signals/time_series";
import { assertClose, expectIntegrityError, makeComponent, nominalSignals } from "./support";

const G = DEFAULT_ENGINE_OPTIONS.guards;

{
  const { hazard_per_h, guards } = computeHazardRate(makeComponent(), 4380, G);
  assert.equal(hazard_per_h, 1e-6);
  assert.equal(guards.triggered, false);
  console.log("[OK] nominal signals give the baseline hazard");
}

{
  // λ = 2e-6 · 1.5 · 2 / 0.5 · (1 + 1e-4·1000) · (1 + 1e-3·200) · (1 − 0.25)
  const component = makeComponent({
    baseline_hazard_per_h: 2e-6,
    hazard_model: new MultiplicativeHazardModel(1e-4, 1e-3),
    signals: nominalSignals({
      age_h: constantSeries(1000),
      cycle_count: constantSeries(200),
      environment_factor: constantSeries(1.5),
      stress_factor: constantSeries(2),
      maintenance_quality: constantSeries(0.5),
      diagnostic_coverage: constantSeries(0.25)
    })
  });
  const expected = ((2e-6 * 1.5 * 2) / 0.5) * 1.1 * 1.2 * 0.75;
  assertClose(computeHazardRate(component, 10, G).hazard_per_h, expected, 1e-12, "multiplicative λ");

  const weibull = createHazardModel({ kind: "weibull", beta: 1, eta_h: 1e5 });
  assert.equal(weibull.kind, "weibull");
  assertClose(computeHazardRate(makeComponent({ hazard_model: weibull }), 500, G).hazard_per_h, 1e-5, 1e-12, "weibull β=1 is constant 1/η");
  console.log("[OK] hazard strategies");
}

{
  // Maintenance quality 0 would divide by zero; it is floored and flagged.
  const component = makeComponent({ signals: nominalSignals({ maintenance_quality: constantSeries(0) }) });
  const { hazard_per_h, guards } = computeHazardRate(component, 4380, G);
  assert.ok(Number.isFinite(hazard_per_h));
  assertClose(hazard_per_h, 1e-3, 1e-12, "floored λ");
  assert.deepEqual(guards.snapshot(), [
    {
      code: "MAINTENANCE_QUALITY_FLOORED",
      component_id: "PT-101",
      signal: "maintenance_quality",
      first_t_h: 4380,
      first_raw_value: 0,
      applied_value: 1e-3,
      occurrences: 1
    }
  ]);
  console.log("[OK] maintenance quality floor");
}

{
  const component = makeComponent({ signals: nominalSignals({ diagnostic_coverage: constantSeries(1.5) }) });
  const { hazard_per_h, guards } = computeHazardRate(component, 1, G);
  assert.equal(hazard_per_h, 0);
  const [event] = guards.snapshot();
  assert.equal(event.code, "DIAGNOSTIC_COVERAGE_CLAMPED");
  assert.equal(event.applied_value, 1);
  console.log("[OK] diagnostic coverage clamp");
}

{
  const component = makeComponent({
    signals: nominalSignals({
      age_h: sampledSeries([
        { t_h: 0, value: 0 },
        { t_h: 100, value: 100 }
      ])
    })
  });
  expectIntegrityError(() => computeHazardRate(component, 200, G), "InputError", "SIGNAL_UNDEFINED", "PT-101");

  const { stress_factor: _dropped, ...partial } = nominalSignals();
  expectIntegrityError(() => readSignalsAt(partial, 1, "PT-101"), "InputError", "SIGNAL_MISSING", "PT-101");

  const negative = makeComponent({ signals: nominalSignals({ environment_factor: constantSeries(-1) }) });
  expectIntegrityError(() => computeHazardRate(negative, 1, G), "InputError", "SIGNAL_OUT_OF_DOMAIN", "PT-101");
  console.log("[OK] signal read failures are InputErrors [FAIL-AS-EXPECTED]");
}

{
  const held = sampledSeries(
    [
      { t_h: 10, value: 1 },
      { t_h: 20, value: 3 }
    ],
    "hold"
  );
  assert.equal(held.evaluate(0), 1);
  assert.equal(held.evaluate(15), 2);
  assert.equal(held.evaluate(25), 3);
  assert.throws(() => sampledSeries([]), RangeError);
  assert.throws(
    () =>
      sampledSeries([
        { t_h: 5, value: 1 },
        { t_h: 5, value: 2 }
      ]),
    RangeError
  );
  console.log("[OK] sampled series interpolation and extrapolation");
}
