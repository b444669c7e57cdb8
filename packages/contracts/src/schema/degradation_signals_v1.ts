import { z } from "zod";

/**
 * Names of the degradation signals a component must supply.
 *
 * The external signal provider delivers each of them as a time series in hours
 * since the start of the component's analyzed horizon.
 */
export const DEGRADATION_SIGNAL_NAMES_V1 = Object.freeze([
  "age_h",
  "cycle_count",
  "environment_factor",
  "stress_factor",
  "maintenance_quality",
  "diagnostic_coverage"
] as const);

export type DegradationSignalNameV1 = (typeof DEGRADATION_SIGNAL_NAMES_V1)[number];

export const SignalSampleV1Z = z
  .object({
    t_h: z.number().finite().nonnegative(), // sample time (hours)
    value: z.number().finite()
  })
  .strict();

export const SignalSeriesV1Z = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("constant"),
      value: z.number().finite()
    })
    .strict(),
  z
    .object({
      kind: z.literal("samples"),
      samples: z
        .array(SignalSampleV1Z)
        .min(1)
        .refine((xs) => xs.every((s, i) => i === 0 || s.t_h > xs[i - 1].t_h), {
          message: "samples must be strictly increasing in t_h"
        }),
      // none: undefined outside [first, last]; hold: edge values extend outward
      extrapolation: z.enum(["none", "hold"]).default("none")
    })
    .strict()
]);

// Every field is optional at the shape level: a missing signal is an input problem
// of the component, reported by admission with the component identity.
export const DegradationSignalsV1Z = z
  .object({
    age_h: SignalSeriesV1Z.optional(),
    cycle_count: SignalSeriesV1Z.optional(),
    environment_factor: SignalSeriesV1Z.optional(),
    stress_factor: SignalSeriesV1Z.optional(),
    maintenance_quality: SignalSeriesV1Z.optional(),
    diagnostic_coverage: SignalSeriesV1Z.optional()
  })
  .strict();

export type SignalSampleV1 = z.infer<typeof SignalSampleV1Z>;
export type SignalSeriesV1 = z.infer<typeof SignalSeriesV1Z>;
export type DegradationSignalsV1 = z.infer<typeof DegradationSignalsV1Z>;
