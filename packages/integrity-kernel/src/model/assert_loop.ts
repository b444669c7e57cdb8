// Integrity Kernel - loop configuration checks
//
// Runs before any numeric work. Everything here is a ConfigError: the loop as
// configured cannot be evaluated at any t.

import { isSilLevelV1 } from "@siltime/contracts";
import type { AggregationRegistry, AggregationStrategy } from "../aggregation/aggregation_strategy";
import { ConfigError } from "../errors/integrity_errors";
import type { DemandMode, Loop, SilLevel } from "./types";

export type CheckedLoop = {
  readonly loop: Loop;
  readonly demand_mode: DemandMode;
  readonly target_sil: SilLevel;
  readonly strategy: AggregationStrategy;
};

export function assertLoopConfig(loop: Loop, registry: AggregationRegistry): CheckedLoop {
  if (loop.components.length === 0) {
    throw new ConfigError("LOOP_EMPTY", `loop ${loop.loop_id} has no components`);
  }

  const target = loop.target_sil;
  if (!isSilLevelV1(target)) {
    throw new ConfigError("TARGET_SIL_INVALID", `target SIL must be an integer in 0..4 (got ${target})`, null, { target_sil: target });
  }

  const seen = new Set<string>();
  for (const c of loop.components) {
    if (seen.has(c.component_id)) {
      throw new ConfigError("COMPONENT_ID_DUPLICATE", `component id is used twice in loop ${loop.loop_id}`, c.component_id);
    }
    seen.add(c.component_id);

    if (!Number.isFinite(c.proof_test_interval_h) || c.proof_test_interval_h <= 0) {
      throw new ConfigError("PROOF_TEST_INTERVAL_INVALID", `proof-test interval must be > 0 (got ${c.proof_test_interval_h})`, c.component_id);
    }
    if (!Number.isFinite(c.mission_time_h) || c.mission_time_h <= 0) {
      throw new ConfigError("MISSION_TIME_INVALID", `mission time must be > 0 (got ${c.mission_time_h})`, c.component_id);
    }
    if (!Number.isFinite(c.baseline_hazard_per_h) || c.baseline_hazard_per_h < 0) {
      throw new ConfigError("BASELINE_HAZARD_INVALID", `baseline hazard must be ≥ 0 (got ${c.baseline_hazard_per_h})`, c.component_id);
    }
  }

  const modes = new Set(loop.components.map((c) => c.demand_mode));
  if (modes.size > 1) {
    throw new ConfigError("LOOP_DEMAND_MODE_MIXED", `loop ${loop.loop_id} mixes low- and high-demand components`, null, {
      demand_modes: [...modes].sort()
    });
  }

  const strategy = registry.resolve(loop.architecture);
  return { loop, demand_mode: loop.components[0].demand_mode, target_sil: target, strategy };
}
