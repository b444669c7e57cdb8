import { z } from "zod"; // Zod: runtime schema validation (engineering source of truth for contracts)

export const SemVerZ = z
  .string() // schema_version is carried as a string
  .regex(/^\d+\.\d+\.\d+$/); // SemVer shape only, no free text

export const DemandModeV1Z = z.enum(["low", "high"]); // low = PFDavg, high/continuous = PFH

export const SilLevelV1Z = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4)]); // integrity bands

export const IntegrityMetricV1Z = z.enum(["PFDavg", "PFH"]);

export const PfdMethodV1Z = z.enum(["auto", "exact", "approx"]);

export const ErrorKindV1Z = z.enum(["InputError", "NumericalError", "ConfigError"]);

export type DemandModeV1 = z.infer<typeof DemandModeV1Z>;
export type SilLevelV1 = z.infer<typeof SilLevelV1Z>;
export type IntegrityMetricV1 = z.infer<typeof IntegrityMetricV1Z>;
export type PfdMethodV1 = z.infer<typeof PfdMethodV1Z>;
export type ErrorKindV1 = z.infer<typeof ErrorKindV1Z>;

/**
 * Frozen list of SIL levels, highest integrity last.
 */
export const SIL_LEVELS_V1: ReadonlyArray<SilLevelV1> = Object.freeze([0, 1, 2, 3, 4] as const);

/**
 * Narrows an arbitrary number to a SIL level.
 */
export function isSilLevelV1(value: number): value is SilLevelV1 {
  return Number.isInteger(value) && value >= 0 && value <= 4;
}
