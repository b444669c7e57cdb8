import { z } from "zod";
import { DemandModeV1Z } from "./common_v1";
import { DegradationSignalsV1Z } from "./degradation_signals_v1";

export const HazardModelSpecV1Z = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("multiplicative"),
      aging_coefficient_per_h: z.number().finite().nonnegative().default(0),
      cycle_coefficient: z.number().finite().nonnegative().default(0)
    })
    .strict(),
  z
    .object({
      kind: z.literal("weibull"),
      beta: z.number().finite(), // shape; domain (>= 1) is enforced at admission
      eta_h: z.number().finite() // scale in hours; domain (> 0) is enforced at admission
    })
    .strict()
]);

// Numeric domains (positive proof-test interval, positive mission time, nonnegative
// baseline) are checked by the kernel so that they surface as ConfigError codes.
export const ComponentConfigV1Z = z
  .object({
    component_id: z.string().min(1),
    baseline_hazard_per_h: z.number().finite(),
    proof_test_interval_h: z.number().finite(),
    demand_mode: DemandModeV1Z,
    mission_time_h: z.number().finite(),
    hazard_model: HazardModelSpecV1Z.default({
      kind: "multiplicative",
      aging_coefficient_per_h: 0,
      cycle_coefficient: 0
    }),
    signals: DegradationSignalsV1Z
  })
  .strict();

export type HazardModelSpecV1 = z.infer<typeof HazardModelSpecV1Z>;
export type ComponentConfigV1 = z.infer<typeof ComponentConfigV1Z>;
