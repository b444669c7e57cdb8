import { z } from "zod";
import { ErrorKindV1Z, SemVerZ } from "./common_v1";

// A failed SIL(t) query. There is no partial report: a failing component fails the loop.
export const SilFailureV1Z = z
  .object({
    type: z.literal("sil_failure_v1"),
    schema_version: SemVerZ,
    loop_id: z.string().min(1), // "UNKNOWN" when the query could not be parsed far enough
    query_t_h: z.number().nullable(),
    error_kind: ErrorKindV1Z,
    error_code: z.string().min(1), // stable machine-readable code
    component_id: z.string().min(1).nullable(), // offending component, when one is known
    message: z.string()
  })
  .strict();

export type SilFailureV1 = z.infer<typeof SilFailureV1Z>;

export function parseSilFailureV1(input: unknown): SilFailureV1 {
  return SilFailureV1Z.parse(input);
}
