import assert from "node:assert";
import * as fs from "node:fs"; // fs: read fixtures without resolveJsonModule
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import {
  HazardModelSpecV1Z,
  SilQueryV1Z,
  SilReportV1Z,
  parseSilFailureV1,
  isSilLevelV1
} from "../index";

const testDir = path.dirname(fileURLToPath(import.meta.url)); // anchor fixtures to this file, not to cwd

function readFixtureJson(relPathFromTestDir: string): unknown {
  const abs = path.resolve(testDir, relPathFromTestDir);
  return JSON.parse(fs.readFileSync(abs, "utf8"));
}

function expectOk(name: string, obj: unknown): void {
  SilQueryV1Z.parse(obj);
  console.log(`[OK] ${name}`);
}

function expectFail(name: string, obj: unknown, issuePath: string): void {
  const r = SilQueryV1Z.safeParse(obj);
  assert.equal(r.success, false, `expected fail but passed: ${name}`);
  if (!r.success) {
    const paths = r.error.issues.map((i) => i.path.join("."));
    assert.ok(paths.includes(issuePath), `${name}: expected issue at ${issuePath}, got ${paths.join(", ")}`);
    console.log(`[FAIL-AS-EXPECTED] ${name}: ${issuePath}`);
  }
}

expectOk("sil_query_ok_001", readFixtureJson("../../fixtures/sil_query_ok_001.json"));
expectFail(
  "sil_query_bad_sample_order_001",
  readFixtureJson("../../fixtures/sil_query_bad_sample_order_001.json"),
  "loop.components.0.signals.age_h.samples"
);
expectFail(
  "sil_query_bad_demand_mode_001",
  readFixtureJson("../../fixtures/sil_query_bad_demand_mode_001.json"),
  "loop.components.0.demand_mode"
);
expectFail("sil_query_bad_extra_field_001", readFixtureJson("../../fixtures/sil_query_bad_extra_field_001.json"), "loop");

// Defaults: hazard model falls back to the neutral multiplicative strategy; sampled series to no extrapolation.
{
  const parsed = SilQueryV1Z.parse(readFixtureJson("../../fixtures/sil_query_ok_001.json"));
  const c = parsed.loop.components[0];
  assert.deepEqual(c.hazard_model, { kind: "multiplicative", aging_coefficient_per_h: 0, cycle_coefficient: 0 });
  const age = c.signals.age_h;
  assert.ok(age && age.kind === "samples");
  if (age && age.kind === "samples") assert.equal(age.extrapolation, "none");
  console.log("[OK] defaults applied");
}

// Weibull spec keeps its parameters verbatim; domain checks live in admission.
{
  const w = HazardModelSpecV1Z.parse({ kind: "weibull", beta: 0.5, eta_h: 100 });
  assert.deepEqual(w, { kind: "weibull", beta: 0.5, eta_h: 100 });
  console.log("[OK] weibull spec shape");
}

// Report contract: reliability must stay in (0, 1].
{
  const component = {
    component_id: "PT-101",
    demand_mode: "low",
    hazard_per_h: 1e-6,
    cumulative_hazard: 0,
    reliability: 1,
    unreliability: 0,
    reliability_floored: false,
    pfd_avg: 4.38e-3,
    pfh: null,
    pfd_method: "approx",
    approximation_check: {
      valid: true,
      window_start_h: 0,
      window_end_h: 8760,
      relative_change: 0,
      hazard_interval_product: 8.76e-3
    },
    guards: [],
    numerical_retry: false
  };
  const report = {
    type: "sil_report_v1",
    schema_version: "1.0.0",
    report_id: "sil_0001",
    evaluated_at_ts: 1700000000000,
    loop_id: "LOOP-PT-101",
    query_t_h: 0,
    architecture: "series",
    demand_mode: "low",
    metric: "PFDavg",
    value: 4.38e-3,
    loop_hazard_per_h: 1e-6,
    sil: 2,
    below_sil4_floor: false,
    target_sil: 2,
    mission_time_h: 87600,
    valid: true,
    reasons: [],
    degraded_confidence: false,
    guards: [],
    components: [component]
  };
  assert.equal(SilReportV1Z.safeParse(report).success, true);
  const zeroReliability = { ...report, components: [{ ...component, reliability: 0, unreliability: 1 }] };
  assert.equal(SilReportV1Z.safeParse(zeroReliability).success, false);
  console.log("[OK] report reliability bounds");
}

{
  const failure = parseSilFailureV1({
    type: "sil_failure_v1",
    schema_version: "1.0.0",
    loop_id: "LOOP-PT-101",
    query_t_h: 10,
    error_kind: "InputError",
    error_code: "SIGNAL_UNDEFINED",
    component_id: "PT-101",
    message: "signal undefined"
  });
  assert.equal(failure.component_id, "PT-101");
  assert.throws(() => parseSilFailureV1({ ...failure, error_kind: "GuardTriggered" }));
  console.log("[OK] failure envelope");
}

assert.equal(isSilLevelV1(4), true);
assert.equal(isSilLevelV1(5), false);
assert.equal(isSilLevelV1(2.5), false);

console.log("contracts tests ok");
