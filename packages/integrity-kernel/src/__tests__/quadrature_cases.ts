// ReliabilityIntegrator: quadrature accuracy, failure modes, cumulative hazard.

import assert from "node:assert";

import { GuardCollector } from "../hazard/signal_guards";
import { MultiplicativeHazardModel, WeibullHazardModel } from "../hazard/hazard_model";
import { DEFAULT_ENGINE_OPTIONS } from "../options/engine_options";
import {
  IncrementalCumulativeHazard,
  type IntegrationContext,
  cumulativeHazard,
  reliabilityAt,
  reliabilityCurve,
  reliabilityFromCumulativeHazard
} from "../reliability/cumulative_hazard";
import { type QuadratureOptions, integrate } from "../reliability/quadrature";
import { assertClose, expectIntegrityError, makeComponent } from "./support";

const Q: QuadratureOptions = DEFAULT_ENGINE_OPTIONS.quadrature;

function ctxFor(componentId: string): IntegrationContext {
  return { quadrature: Q, guards: DEFAULT_ENGINE_OPTIONS.guards, collector: new GuardCollector(componentId) };
}

{
  const r = integrate(Math.sin, 0, Math.PI, Q);
  assertClose(r.value, 2, 1e-9, "∫ sin over [0, π]");
  assert.ok(r.evaluations > 0);
  assert.equal(integrate(Math.sin, 1, 1, Q).value, 0);
  console.log("[OK] quadrature accuracy");
}

{
  expectIntegrityError(() => integrate((x) => x, 0, 1, { ...Q, max_evaluations: 3 }), "NumericalError", "NUMERICAL_BUDGET_EXHAUSTED");
  expectIntegrityError(
    () => integrate((x) => (x < 0.3 ? 0 : 1), 0, 1, { ...Q, relative_tolerance: 1e-12, max_depth: 2, initial_panels: 1 }),
    "NumericalError",
    "NUMERICAL_NOT_CONVERGED"
  );
  expectIntegrityError(() => integrate((x) => 1 / x, 0, 1, Q), "NumericalError", "NUMERICAL_NON_FINITE");
  expectIntegrityError(() => integrate((x) => x, 2, 1, Q), "NumericalError", "NUMERICAL_INVALID_INTERVAL");
  console.log("[OK] quadrature failures are NumericalErrors [FAIL-AS-EXPECTED]");
}

{
  let calls = 0;
  const f = (x: number): number => {
    calls += 1;
    return x;
  };
  expectIntegrityError(() => integrate(f, 0, 1, Q, { deadline_ts: 0 }), "NumericalError", "NUMERICAL_DEADLINE_EXCEEDED");
  const aborted = new AbortController();
  aborted.abort();
  expectIntegrityError(() => integrate(f, 0, 1, Q, { signal: aborted.signal }), "NumericalError", "NUMERICAL_DEADLINE_EXCEEDED");
  assert.equal(calls, 0);
  console.log("[OK] quadrature observes deadline and abort");
}

{
  // λ = 1e-6·(1 + 1e-4·t)  =>  Λ(0, t) = 1e-6·(t + 5e-5·t²)
  const component = makeComponent({ hazard_model: new MultiplicativeHazardModel(1e-4, 0) });
  const ctx = ctxFor(component.component_id);
  assertClose(cumulativeHazard(component, 0, 20000, ctx), 0.04, 1e-9, "Λ(0, 20000)");

  const curve = reliabilityCurve(component, [20000, 0, 5000, 1000], ctx);
  assert.deepEqual(
    curve.map((p) => p.t_h),
    [0, 1000, 5000, 20000]
  );
  assert.equal(curve[0].reliability, 1);
  assert.equal(curve[0].unreliability, 0);
  for (let i = 1; i < curve.length; i++) {
    assert.ok(curve[i].reliability <= curve[i - 1].reliability, `R must not increase at t=${curve[i].t_h}`);
  }
  for (const p of curve) {
    assert.equal(p.unreliability, 1 - p.reliability);
    assert.ok(p.reliability > 0 && p.reliability <= 1);
  }
  assertClose(reliabilityAt(component, 20000, ctx).reliability, Math.exp(-0.04), 1e-9, "R(20000)");
  console.log("[OK] reliability curve: R(0)=1, non-increasing, F=1-R");
}

{
  const floored = reliabilityFromCumulativeHazard(10, 1e6);
  assert.equal(floored.reliability, Number.MIN_VALUE);
  assert.equal(floored.unreliability, 1);
  assert.equal(floored.cumulative_hazard, 1e6);
  assert.equal(floored.reliability_floored, true);
  assert.equal(reliabilityFromCumulativeHazard(10, 700).reliability_floored, false);
  console.log("[OK] reliability underflow is floored and flagged");
}

{
  const component = makeComponent();
  const running = new IncrementalCumulativeHazard(component);
  const ctx = ctxFor(component.component_id);

  assertClose(running.at(1000, ctx), 1e-3, 1e-9, "Λ(0, 1000)");
  assertClose(running.at(3000, ctx), 3e-3, 1e-9, "Λ(0, 3000) extended");
  assert.equal(running.freshRestarts, 0);

  assertClose(running.at(2000, ctx), 2e-3, 1e-9, "Λ(0, 2000) after a backwards query");
  assert.equal(running.freshRestarts, 1);
  assert.equal(running.cachedPoint.t_h, 2000);
  console.log("[OK] incremental cumulative hazard restarts on backwards queries");
}

{
  // β = 2, η = 1e4: Λ(0, t) = (t/η)^β with age = t.
  const component = makeComponent({ hazard_model: new WeibullHazardModel(2, 10000) });
  const ctx = ctxFor(component.component_id);
  const p = reliabilityAt(component, 5000, ctx);
  assertClose(p.cumulative_hazard, 0.25, 1e-9, "weibull Λ(0, 5000)");
  assertClose(p.reliability, Math.exp(-0.25), 1e-9, "weibull R(5000)");

  expectIntegrityError(() => new WeibullHazardModel(0.5, 10000), "ConfigError", "HAZARD_MODEL_INVALID");
  expectIntegrityError(() => new WeibullHazardModel(2, 0), "ConfigError", "HAZARD_MODEL_INVALID");
  console.log("[OK] weibull hazard");
}
