// Integrity Kernel - engine options
//
// Every tunable of a computation pass, resolved once per query. Defaults mirror
// config/evaluator/default.json so library callers and the service agree.

import { ConfigError } from "../errors/integrity_errors";
import type { PfdMethod } from "../model/types";
import type { QuadratureOptions } from "../reliability/quadrature";
import type { CancellationToken } from "./cancellation";

export type GuardOptions = {
  // Lower bound applied to maintenance quality before it is used as a divisor.
  readonly maintenance_quality_floor: number;
};

export type RetryOptions = {
  readonly tolerance_relax_factor: number;
  readonly budget_factor: number;
  readonly extra_depth: number;
};

export type ApproximationOptions = {
  // Number of sub-intervals used to sample λ across a proof-test window.
  readonly samples: number;
  readonly max_relative_change: number;
  readonly max_hazard_interval_product: number;
};

export type EngineOptions = {
  readonly pfd_method: PfdMethod;
  readonly guards: GuardOptions;
  readonly quadrature: QuadratureOptions;
  readonly retry: RetryOptions;
  readonly approximation: ApproximationOptions;
  readonly cancellation?: CancellationToken;
  readonly now: () => number;
};

export type EngineOptionsInput = {
  pfd_method?: PfdMethod;
  guards?: Partial<GuardOptions>;
  quadrature?: Partial<QuadratureOptions>;
  retry?: Partial<RetryOptions>;
  approximation?: Partial<ApproximationOptions>;
  cancellation?: CancellationToken;
  now?: () => number;
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = Object.freeze({
  pfd_method: "auto",
  guards: Object.freeze({ maintenance_quality_floor: 1e-3 }),
  quadrature: Object.freeze({
    relative_tolerance: 1e-9,
    absolute_tolerance: 1e-15,
    max_depth: 40,
    max_evaluations: 200_000,
    initial_panels: 8
  }),
  retry: Object.freeze({ tolerance_relax_factor: 100, budget_factor: 4, extra_depth: 10 }),
  approximation: Object.freeze({ samples: 16, max_relative_change: 0.1, max_hazard_interval_product: 0.1 }),
  now: () => Date.now()
});

/**
 * Merges caller overrides onto the defaults and checks every numeric domain.
 */
export function resolveEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  const resolved: EngineOptions = {
    pfd_method: input.pfd_method ?? DEFAULT_ENGINE_OPTIONS.pfd_method,
    guards: { ...DEFAULT_ENGINE_OPTIONS.guards, ...input.guards },
    quadrature: { ...DEFAULT_ENGINE_OPTIONS.quadrature, ...input.quadrature },
    retry: { ...DEFAULT_ENGINE_OPTIONS.retry, ...input.retry },
    approximation: { ...DEFAULT_ENGINE_OPTIONS.approximation, ...input.approximation },
    cancellation: input.cancellation,
    now: input.now ?? DEFAULT_ENGINE_OPTIONS.now
  };

  const checks: Array<[string, number, (v: number) => boolean]> = [
    ["guards.maintenance_quality_floor", resolved.guards.maintenance_quality_floor, (v) => v > 0],
    ["quadrature.relative_tolerance", resolved.quadrature.relative_tolerance, (v) => v > 0 && v < 1],
    ["quadrature.absolute_tolerance", resolved.quadrature.absolute_tolerance, (v) => v >= 0],
    ["quadrature.max_depth", resolved.quadrature.max_depth, (v) => Number.isInteger(v) && v >= 1],
    ["quadrature.max_evaluations", resolved.quadrature.max_evaluations, (v) => Number.isInteger(v) && v >= 3],
    ["quadrature.initial_panels", resolved.quadrature.initial_panels, (v) => Number.isInteger(v) && v >= 1],
    ["retry.tolerance_relax_factor", resolved.retry.tolerance_relax_factor, (v) => v >= 1],
    ["retry.budget_factor", resolved.retry.budget_factor, (v) => v >= 1],
    ["retry.extra_depth", resolved.retry.extra_depth, (v) => Number.isInteger(v) && v >= 0],
    ["approximation.samples", resolved.approximation.samples, (v) => Number.isInteger(v) && v >= 1],
    ["approximation.max_relative_change", resolved.approximation.max_relative_change, (v) => v >= 0],
    ["approximation.max_hazard_interval_product", resolved.approximation.max_hazard_interval_product, (v) => v > 0]
  ];
  for (const [path, value, ok] of checks) {
    if (!Number.isFinite(value) || !ok(value)) {
      throw new ConfigError("ENGINE_OPTIONS_INVALID", `${path} is out of range (got ${value})`, null, { path });
    }
  }

  return resolved;
}

/**
 * Options for the single retry after a NumericalError: looser tolerance, larger
 * budget, deeper refinement.
 */
export function relaxedQuadrature(options: EngineOptions): QuadratureOptions {
  const q = options.quadrature;
  return {
    relative_tolerance: Math.min(0.5, q.relative_tolerance * options.retry.tolerance_relax_factor),
    absolute_tolerance: q.absolute_tolerance * options.retry.tolerance_relax_factor,
    max_depth: q.max_depth + options.retry.extra_depth,
    max_evaluations: Math.ceil(q.max_evaluations * options.retry.budget_factor),
    initial_panels: q.initial_panels * 2
  };
}
