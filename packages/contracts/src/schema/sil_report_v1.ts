import { z } from "zod"; // Zod: runtime schema validation for the engine output
import { DemandModeV1Z, IntegrityMetricV1Z, SemVerZ, SilLevelV1Z } from "./common_v1";
import { DEGRADATION_SIGNAL_NAMES_V1 } from "./degradation_signals_v1";

export const GuardCodeV1Z = z.enum(["MAINTENANCE_QUALITY_FLOORED", "DIAGNOSTIC_COVERAGE_CLAMPED"]);

export const GuardEventV1Z = z
  .object({
    code: GuardCodeV1Z,
    component_id: z.string().min(1),
    signal: z.enum(DEGRADATION_SIGNAL_NAMES_V1),
    first_t_h: z.number().finite(), // first evaluation time at which the guard fired
    first_raw_value: z.number().finite(),
    applied_value: z.number().finite(),
    occurrences: z.number().int().positive()
  })
  .strict();

export const ValidityReasonV1Z = z.discriminatedUnion("code", [
  z
    .object({
      code: z.literal("SIL_BELOW_TARGET"),
      sil: SilLevelV1Z,
      target_sil: SilLevelV1Z
    })
    .strict(),
  z
    .object({
      code: z.literal("BEYOND_MISSION_TIME"),
      t_h: z.number().finite(),
      mission_time_h: z.number().finite()
    })
    .strict()
]);

export const PfdApproximationCheckV1Z = z
  .object({
    valid: z.boolean(),
    window_start_h: z.number().finite(),
    window_end_h: z.number().finite(),
    relative_change: z.number().finite().nonnegative(), // (max - min) / max of the sampled hazard
    hazard_interval_product: z.number().finite().nonnegative() // max hazard x window length
  })
  .strict();

export const ComponentIntegrityV1Z = z
  .object({
    component_id: z.string().min(1),
    demand_mode: DemandModeV1Z,
    hazard_per_h: z.number().finite().nonnegative(),
    cumulative_hazard: z.number().finite().nonnegative(),
    reliability: z.number().gt(0).lte(1),
    unreliability: z.number().gte(0).lte(1), // 1 − R; rounds to 1 once R drops below machine epsilon
    reliability_floored: z.boolean(), // exp(−Λ) underflowed; reliability holds Number.MIN_VALUE
    pfd_avg: z.number().finite().nonnegative().nullable(),
    pfh: z.number().finite().nonnegative().nullable(),
    pfd_method: z.enum(["exact", "approx"]).nullable(),
    approximation_check: PfdApproximationCheckV1Z.nullable(),
    guards: z.array(GuardEventV1Z),
    numerical_retry: z.boolean() // true when the relaxed-tolerance retry produced this result
  })
  .strict();

export const SilReportV1Z = z
  .object({
    type: z.literal("sil_report_v1"),
    schema_version: SemVerZ,
    report_id: z.string().min(1),
    evaluated_at_ts: z.number().int().nonnegative(), // wall clock (ms) of the evaluation
    loop_id: z.string().min(1),
    query_t_h: z.number().finite().nonnegative(),
    architecture: z.string().min(1),
    demand_mode: DemandModeV1Z,
    metric: IntegrityMetricV1Z,
    value: z.number().finite().nonnegative(), // aggregated PFDavg or PFH
    loop_hazard_per_h: z.number().finite().nonnegative(),
    sil: SilLevelV1Z,
    below_sil4_floor: z.boolean(),
    target_sil: SilLevelV1Z,
    mission_time_h: z.number().finite().positive(),
    valid: z.boolean(),
    reasons: z.array(ValidityReasonV1Z),
    degraded_confidence: z.boolean(),
    guards: z.array(GuardEventV1Z),
    components: z.array(ComponentIntegrityV1Z).min(1)
  })
  .strict();

export const SilTrajectoryV1Z = z
  .object({
    type: z.literal("sil_trajectory_v1"),
    schema_version: SemVerZ,
    loop_id: z.string().min(1),
    points: z.array(SilReportV1Z),
    first_invalid_t_h: z.number().finite().nullable()
  })
  .strict();

export type GuardCodeV1 = z.infer<typeof GuardCodeV1Z>;
export type GuardEventV1 = z.infer<typeof GuardEventV1Z>;
export type ValidityReasonV1 = z.infer<typeof ValidityReasonV1Z>;
export type PfdApproximationCheckV1 = z.infer<typeof PfdApproximationCheckV1Z>;
export type ComponentIntegrityV1 = z.infer<typeof ComponentIntegrityV1Z>;
export type SilReportV1 = z.infer<typeof SilReportV1Z>;
export type SilTrajectoryV1 = z.infer<typeof SilTrajectoryV1Z>;

export function parseSilReportV1(input: unknown): SilReportV1 {
  return SilReportV1Z.parse(input); // fails loudly; used as an output admission check
}
