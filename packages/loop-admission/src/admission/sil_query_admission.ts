import { ZodError } from "zod"; // Schema failures are mapped onto ConfigError.

import {
  type LoopConfigV1,
  type PfdMethodV1,
  type SilQueryV1,
  SilQueryV1Z,
  type SilTrajectoryQueryV1,
  SilTrajectoryQueryV1Z
} from "@siltime/contracts"; // Wire contracts: structural shape only.
import {
  type AggregationRegistry,
  type CheckedLoop,
  type Component,
  ConfigError,
  type Loop,
  assertLoopConfig,
  createHazardModel,
  defaultAggregationRegistry,
  isIntegrityError
} from "@siltime/integrity-kernel"; // Kernel types and the loop configuration checks it owns.
import { buildDegradationSignals } from "../signals/signal_series";

export type AdmittedLoop = {
  loop: Loop;
  checked: CheckedLoop;
};

export type AdmittedSilQueryV1 = AdmittedLoop & {
  query: SilQueryV1;
  t_h: number;
  pfd_method?: PfdMethodV1; // per-query override of the engine default
};

export type AdmittedSilTrajectoryQueryV1 = AdmittedLoop & {
  query: SilTrajectoryQueryV1;
  times_h: number[];
  pfd_method?: PfdMethodV1;
};

export type SchemaIssue = { path: string; code: string; message: string };

export function schemaIssues(err: ZodError): SchemaIssue[] {
  return err.issues.map((i) => ({ path: i.path.join("."), code: i.code, message: i.message }));
}

function parseOrConfigError<T>(parse: () => T, documentType: string): T {
  try {
    return parse(); // first gate: closed structural shape (no extra fields, known enums)
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = schemaIssues(e);
      throw new ConfigError(
        "CONFIG_SCHEMA_INVALID",
        `${documentType} failed schema validation at ${issues.map((i) => i.path || "<root>").join(", ")}`,
        null,
        { issues }
      );
    }
    throw e;
  }
}

function admitComponent(spec: LoopConfigV1["components"][number]): Component {
  try {
    return {
      component_id: spec.component_id,
      baseline_hazard_per_h: spec.baseline_hazard_per_h,
      proof_test_interval_h: spec.proof_test_interval_h,
      demand_mode: spec.demand_mode,
      mission_time_h: spec.mission_time_h,
      hazard_model: createHazardModel(spec.hazard_model), // second gate: strategy parameters (weibull beta/eta domains)
      signals: buildDegradationSignals(spec.signals, spec.component_id) // third gate: all six signals present
    };
  } catch (e) {
    throw isIntegrityError(e) ? e.withComponent(spec.component_id) : e;
  }
}

/**
 * Builds the kernel loop from its wire configuration and runs the kernel's
 * configuration checks (architecture, target, intervals, demand modes).
 */
export function admitLoopConfigV1(config: LoopConfigV1, registry: AggregationRegistry = defaultAggregationRegistry()): AdmittedLoop {
  const loop: Loop = {
    loop_id: config.loop_id,
    architecture: config.architecture,
    target_sil: config.target_sil,
    components: config.components.map(admitComponent)
  };
  return { loop, checked: assertLoopConfig(loop, registry) }; // fourth gate: kernel-owned loop checks
}

export function admitSilQueryV1(input: unknown, registry: AggregationRegistry = defaultAggregationRegistry()): AdmittedSilQueryV1 {
  const query = parseOrConfigError(() => SilQueryV1Z.parse(input), "sil_query_v1");
  return {
    ...admitLoopConfigV1(query.loop, registry),
    query,
    t_h: query.t_h,
    pfd_method: query.options?.pfd_method
  };
}

export function admitSilTrajectoryQueryV1(
  input: unknown,
  registry: AggregationRegistry = defaultAggregationRegistry()
): AdmittedSilTrajectoryQueryV1 {
  const query = parseOrConfigError(() => SilTrajectoryQueryV1Z.parse(input), "sil_trajectory_query_v1");
  return {
    ...admitLoopConfigV1(query.loop, registry),
    query,
    times_h: [...query.times_h],
    pfd_method: query.options?.pfd_method
  };
}

export function isAdmissibleSilQueryV1(input: unknown): boolean {
  try {
    admitSilQueryV1(input);
    return true;
  } catch (e) {
    if (isIntegrityError(e)) return false;
    throw e;
  }
}

/**
 * Best-effort loop id / query time of a document that may not have passed
 * admission, for failure envelopes.
 */
export function queryHints(input: unknown): { loop_id: string; t_h: number | null } {
  let loop_id = "UNKNOWN";
  let t_h: number | null = null;
  if (typeof input === "object" && input !== null) {
    if ("loop" in input && typeof input.loop === "object" && input.loop !== null && "loop_id" in input.loop) {
      const id = input.loop.loop_id;
      if (typeof id === "string" && id.length > 0) loop_id = id;
    }
    if ("t_h" in input && typeof input.t_h === "number" && Number.isFinite(input.t_h)) t_h = input.t_h;
  }
  return { loop_id, t_h };
}
