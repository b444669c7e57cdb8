// SILMapper, ValidityChecker, MissionTimeCalculator and series aggregation.

import assert from "node:assert";

import type { ComponentIntegrityV1 } from "@siltime/contracts";
import { SERIES_STRATEGY, compensatedSum, defaultAggregationRegistry } from "../aggregation/aggregation_strategy";
import {
  HIGH_DEMAND_BANDS,
  LOW_DEMAND_BANDS,
  classifyIntegrityValue,
  mapToSil,
  silFromPfdAvg,
  silFromPfh
} from "../banding/sil_bands";
import { loopMissionTime } from "../mission/mission_time";
import { checkValidity, silValid } from "../validity/validity_checker";
import { expectIntegrityError, makeComponent, makeLoop } from "./support";

{
  assert.equal(silFromPfdAvg(1e-4), 3);
  assert.equal(silFromPfdAvg(1e-5), 4);
  assert.equal(silFromPfdAvg(1e-3), 2);
  assert.equal(silFromPfdAvg(4.38e-3), 2);
  assert.equal(silFromPfdAvg(1e-2), 1);
  assert.equal(silFromPfdAvg(1e-1), 0);
  assert.equal(silFromPfdAvg(0.9), 0);
  assert.equal(silFromPfdAvg(Number.POSITIVE_INFINITY), 0);

  assert.equal(silFromPfh(1e-9), 4);
  assert.equal(silFromPfh(1e-8), 3);
  assert.equal(silFromPfh(5e-7), 2);
  assert.equal(silFromPfh(1e-6), 1);
  assert.equal(silFromPfh(1e-5), 0);
  console.log("[OK] band boundaries are lower-bound inclusive");
}

{
  assert.deepEqual(classifyIntegrityValue(9.99e-6, "low"), { sil: 4, below_sil4_floor: true });
  assert.deepEqual(classifyIntegrityValue(0, "low"), { sil: 4, below_sil4_floor: true });
  assert.deepEqual(classifyIntegrityValue(5e-10, "high"), { sil: 4, below_sil4_floor: true });
  assert.deepEqual(classifyIntegrityValue(2e-5, "low"), { sil: 4, below_sil4_floor: false });

  expectIntegrityError(() => mapToSil(-1e-9, "low"), "NumericalError", "SIL_VALUE_INVALID");
  expectIntegrityError(() => mapToSil(Number.NaN, "high"), "NumericalError", "SIL_VALUE_INVALID");
  console.log("[OK] below-floor clamp and invalid values");
}

{
  // Every value in [0, ∞) lands in exactly one band (or the SIL 4 floor).
  for (const [mode, bands] of [
    ["low", LOW_DEMAND_BANDS],
    ["high", HIGH_DEMAND_BANDS]
  ] as const) {
    for (let e = -12; e <= 1; e += 0.25) {
      const v = Math.pow(10, e);
      const hits = bands.filter((b) => v >= b.lower && (b.upper === null || v < b.upper));
      const floor = v < bands[0].lower;
      assert.equal(hits.length + (floor ? 1 : 0), 1, `${mode}: ${v} must fall in exactly one band`);
      assert.equal(mapToSil(v, mode), floor ? 4 : hits[0].sil);
    }
    assert.ok(Object.isFrozen(bands) && Object.isFrozen(bands[0]));
  }
  console.log("[OK] bands partition [0, inf)");
}

{
  assert.equal(silValid(3, 2), true);
  assert.equal(silValid(2, 2), true);
  assert.equal(silValid(1, 2), false);

  assert.deepEqual(checkValidity(2, 2, 4380, 87600), { valid: true, reasons: [] });
  assert.deepEqual(checkValidity(2, 2, 87600, 87600), { valid: true, reasons: [] });
  assert.deepEqual(checkValidity(1, 3, 10, 5), {
    valid: false,
    reasons: [
      { code: "SIL_BELOW_TARGET", sil: 1, target_sil: 3 },
      { code: "BEYOND_MISSION_TIME", t_h: 10, mission_time_h: 5 }
    ]
  });
  console.log("[OK] validity gates");
}

{
  const loop = makeLoop([
    makeComponent({ component_id: "A", mission_time_h: 87600 }),
    makeComponent({ component_id: "B", mission_time_h: 43800 }),
    makeComponent({ component_id: "C", mission_time_h: 1e6 })
  ]);
  assert.equal(loopMissionTime(loop), 43800);
  expectIntegrityError(() => loopMissionTime(makeLoop([])), "ConfigError", "LOOP_EMPTY");
  console.log("[OK] loop mission time is the shortest component mission time");
}

{
  const values = [3e-4, 1e-10, 2.5e-3, 7e-6, 1e-4];
  const reversed = [...values].reverse();
  assert.equal(compensatedSum(values), compensatedSum(reversed));
  assert.equal(compensatedSum([0.1, 0.2, 0.3]), compensatedSum([0.3, 0.1, 0.2]));
  assert.equal(compensatedSum([]), 0);

  const result = (id: string, pfd: number, lambda: number): ComponentIntegrityV1 => ({
    component_id: id,
    demand_mode: "low",
    hazard_per_h: lambda,
    cumulative_hazard: 0,
    reliability: 1,
    unreliability: 0,
    reliability_floored: false,
    pfd_avg: pfd,
    pfh: null,
    pfd_method: "approx",
    approximation_check: null,
    guards: [],
    numerical_retry: false
  });
  const agg = SERIES_STRATEGY.aggregate([result("A", 1e-4, 2e-8), result("B", 2e-4, 4e-8)], "low");
  assert.equal(agg.metric, "PFDavg");
  assert.equal(agg.value, compensatedSum([1e-4, 2e-4]));
  assert.equal(agg.loop_hazard_per_h, compensatedSum([2e-8, 4e-8]));

  expectIntegrityError(() => SERIES_STRATEGY.aggregate([result("A", 1e-4, 2e-8)], "high"), "ConfigError", "LOOP_DEMAND_MODE_MIXED", "A");

  const registry = defaultAggregationRegistry();
  assert.deepEqual(registry.architectures(), ["series"]);
  expectIntegrityError(() => registry.resolve("2oo3"), "ConfigError", "UNKNOWN_ARCHITECTURE");
  expectIntegrityError(() => registry.register(SERIES_STRATEGY), "ConfigError", "ARCHITECTURE_ALREADY_REGISTERED");
  console.log("[OK] series aggregation and registry");
}
