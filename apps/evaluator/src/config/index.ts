// apps/evaluator/src/config/index.ts
// SSOT loader + validator for evaluator config.
//
// Source of truth:
//   config/evaluator/default.json
//
// Overrides (in order): SILTIME_CONFIG_PATH picks another file; PORT, HOST and
// LOG_LEVEL replace the matching service fields.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { PfdMethodV1Z, SemVerZ } from "@siltime/contracts";
import type { CancellationToken, EngineOptionsInput } from "@siltime/integrity-kernel";
import { findRepoRoot } from "../util";

export const CONFIG_RELATIVE_PATH = path.join("config", "evaluator", "default.json");

const positiveInt = z.number().int().positive();

export const EvaluatorConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    engine: z
      .object({
        pfd_method: PfdMethodV1Z,
        deadline_ms: positiveInt, // per-query wall-clock budget
        guards: z.object({ maintenance_quality_floor: z.number().positive() }).strict(),
        quadrature: z
          .object({
            relative_tolerance: z.number().positive().lt(1),
            absolute_tolerance: z.number().nonnegative(),
            max_depth: positiveInt,
            max_evaluations: z.number().int().min(3),
            initial_panels: positiveInt
          })
          .strict(),
        retry: z
          .object({
            tolerance_relax_factor: z.number().min(1),
            budget_factor: z.number().min(1),
            extra_depth: z.number().int().nonnegative()
          })
          .strict(),
        approximation: z
          .object({
            samples: positiveInt,
            max_relative_change: z.number().nonnegative(),
            max_hazard_interval_product: z.number().positive()
          })
          .strict()
      })
      .strict(),
    batch: z.object({ max_loops: positiveInt, deadline_ms: positiveInt }).strict(),
    trajectory: z.object({ max_points: positiveInt, deadline_ms: positiveInt }).strict(),
    service: z
      .object({
        port: z.number().int().min(0).max(65535),
        host: z.string().min(1),
        log_level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      })
      .strict()
  })
  .strict();

export type EvaluatorConfigV1 = z.infer<typeof EvaluatorConfigV1Z>;

export class EvaluatorConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(`${message} (${configPath})`);
    this.name = "EvaluatorConfigError";
  }
}

export type LoadEvaluatorConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

function resolveConfigPath(opts: LoadEvaluatorConfigOptions, env: NodeJS.ProcessEnv): string {
  if (opts.configPath) return path.resolve(opts.configPath);
  if (env.SILTIME_CONFIG_PATH) return path.resolve(env.SILTIME_CONFIG_PATH);
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(findRepoRoot(here, CONFIG_RELATIVE_PATH), CONFIG_RELATIVE_PATH);
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== "object" || raw === null || !("service" in raw)) return raw;
  const service = raw.service;
  if (typeof service !== "object" || service === null) return raw;
  return {
    ...raw,
    service: {
      ...service,
      ...(env.PORT ? { port: Number(env.PORT) } : {}),
      ...(env.HOST ? { host: env.HOST } : {}),
      ...(env.LOG_LEVEL ? { log_level: env.LOG_LEVEL } : {})
    }
  };
}

export function loadEvaluatorConfig(opts: LoadEvaluatorConfigOptions = {}): EvaluatorConfigV1 {
  const env = opts.env ?? process.env;
  const p = resolveConfigPath(opts, env);
  if (!fs.existsSync(p)) throw new EvaluatorConfigError("evaluator config not found", p);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (e) {
    throw new EvaluatorConfigError(`evaluator config is not JSON: ${e instanceof Error ? e.message : String(e)}`, p);
  }

  const parsed = EvaluatorConfigV1Z.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new EvaluatorConfigError(`evaluator config is invalid: ${where}`, p);
  }
  return parsed.data;
}

/**
 * Maps the engine section onto kernel options. Cancellation is per call.
 */
export function engineOptionsFromConfig(cfg: EvaluatorConfigV1, cancellation?: CancellationToken): EngineOptionsInput {
  const { engine } = cfg;
  return {
    pfd_method: engine.pfd_method,
    guards: { ...engine.guards },
    quadrature: { ...engine.quadrature },
    retry: { ...engine.retry },
    approximation: { ...engine.approximation },
    cancellation
  };
}
