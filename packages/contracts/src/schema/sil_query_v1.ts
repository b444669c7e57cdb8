import { z } from "zod";
import { PfdMethodV1Z, SemVerZ } from "./common_v1";
import { ComponentConfigV1Z } from "./component_config_v1";

export const LoopConfigV1Z = z
  .object({
    loop_id: z.string().min(1),
    architecture: z.string().min(1), // tag; supported set is owned by the kernel aggregation registry
    target_sil: z.number(), // integer 0..4, enforced by the kernel as ConfigError
    components: z.array(ComponentConfigV1Z)
  })
  .strict();

export const SilQueryOptionsV1Z = z
  .object({
    pfd_method: PfdMethodV1Z.optional()
  })
  .strict();

export const SilQueryV1Z = z
  .object({
    type: z.literal("sil_query_v1"),
    schema_version: SemVerZ,
    loop: LoopConfigV1Z,
    t_h: z.number().finite(), // query time (hours since start of the analyzed horizon)
    options: SilQueryOptionsV1Z.optional()
  })
  .strict();

export const SilTrajectoryQueryV1Z = z
  .object({
    type: z.literal("sil_trajectory_query_v1"),
    schema_version: SemVerZ,
    loop: LoopConfigV1Z,
    times_h: z.array(z.number().finite()).min(1),
    options: SilQueryOptionsV1Z.optional()
  })
  .strict();

export type LoopConfigV1 = z.infer<typeof LoopConfigV1Z>;
export type SilQueryOptionsV1 = z.infer<typeof SilQueryOptionsV1Z>;
export type SilQueryV1 = z.infer<typeof SilQueryV1Z>;
export type SilTrajectoryQueryV1 = z.infer<typeof SilTrajectoryQueryV1Z>;
