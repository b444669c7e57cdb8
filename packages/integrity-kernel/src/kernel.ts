// Integrity Kernel - SIL(t) evaluation entrypoints
//
// For one loop at one query time:
// 1) Check the loop configuration (architecture, target, intervals, demand modes).
// 2) Compute every component independently (fan-out), yielding between them so
//    deadlines and aborts are observed.
// 3) Aggregate (fan-in), band, and check validity against the loop mission time.
//
// No IO. No logging. Reports are parsed against sil_report_v1 before they leave.

import { randomUUID } from "node:crypto";
import {
  type ComponentIntegrityV1,
  type SilFailureV1,
  type SilReportV1,
  type SilTrajectoryV1,
  SilTrajectoryV1Z,
  parseSilFailureV1,
  parseSilReportV1
} from "@siltime/contracts";
import { type AggregationRegistry, defaultAggregationRegistry } from "./aggregation/aggregation_strategy";
import { classifyIntegrityValue } from "./banding/sil_bands";
import { InputError, type IntegrityError, isIntegrityError } from "./errors/integrity_errors";
import { computeComponentIntegrity } from "./integrity/component_integrity";
import { loopMissionTime } from "./mission/mission_time";
import { type CheckedLoop, assertLoopConfig } from "./model/assert_loop";
import type { Component, Loop, PfdMethod } from "./model/types";
import { throwIfCancelled, yieldToEventLoop } from "./options/cancellation";
import { type EngineOptions, type EngineOptionsInput, resolveEngineOptions } from "./options/engine_options";
import { IncrementalCumulativeHazard } from "./reliability/cumulative_hazard";
import { checkValidity } from "./validity/validity_checker";

export const SIL_SCHEMA_VERSION = "1.0.0";

export type LoopQuery = {
  readonly loop: Loop;
  readonly t_h: number;
  // Per-query override of the shared pfd_method.
  readonly pfd_method?: PfdMethod;
};

export type LoopBatchItem =
  | { readonly ok: true; readonly loop_id: string; readonly report: SilReportV1 }
  | { readonly ok: false; readonly loop_id: string; readonly failure: SilFailureV1 };

function newReportId(): string {
  return `silr_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

function assertQueryTime(t: number, loopId: string): void {
  if (!Number.isFinite(t) || t < 0) {
    throw new InputError("QUERY_TIME_INVALID", `query time must be a finite number ≥ 0 (got ${t}) for loop ${loopId}`, null, { t_h: t });
  }
}

async function computeComponents(
  components: ReadonlyArray<Component>,
  t: number,
  options: EngineOptions,
  caches?: ReadonlyMap<string, IncrementalCumulativeHazard>
): Promise<ComponentIntegrityV1[]> {
  return Promise.all(
    components.map(async (c) => {
      await yieldToEventLoop();
      throwIfCancelled(options.cancellation, `component ${c.component_id}`);
      return computeComponentIntegrity(c, t, options, caches?.get(c.component_id));
    })
  );
}

function buildReport(checked: CheckedLoop, t: number, results: ReadonlyArray<ComponentIntegrityV1>, options: EngineOptions): SilReportV1 {
  const { loop } = checked;
  const aggregate = checked.strategy.aggregate(results, checked.demand_mode);
  const band = classifyIntegrityValue(aggregate.value, checked.demand_mode);
  const missionTime = loopMissionTime(loop);
  const validity = checkValidity(band.sil, checked.target_sil, t, missionTime);
  const guards = results.flatMap((r) => r.guards);

  return parseSilReportV1({
    type: "sil_report_v1",
    schema_version: SIL_SCHEMA_VERSION,
    report_id: newReportId(),
    evaluated_at_ts: Math.max(0, Math.floor(options.now())),
    loop_id: loop.loop_id,
    query_t_h: t,
    architecture: loop.architecture,
    demand_mode: checked.demand_mode,
    metric: aggregate.metric,
    value: aggregate.value,
    loop_hazard_per_h: aggregate.loop_hazard_per_h,
    sil: band.sil,
    below_sil4_floor: band.below_sil4_floor,
    target_sil: checked.target_sil,
    mission_time_h: missionTime,
    valid: validity.valid,
    reasons: [...validity.reasons],
    degraded_confidence: guards.length > 0,
    guards,
    components: [...results]
  });
}

/**
 * Evaluates SIL(t) for one loop.
 *
 * A failing component fails the whole query; the thrown IntegrityError names the
 * component. There is no partial report.
 */
export async function evaluateLoopSilV1(
  loop: Loop,
  t_h: number,
  input: EngineOptionsInput = {},
  registry: AggregationRegistry = defaultAggregationRegistry()
): Promise<SilReportV1> {
  const options = resolveEngineOptions(input);
  assertQueryTime(t_h, loop.loop_id);
  const checked = assertLoopConfig(loop, registry);
  throwIfCancelled(options.cancellation, `loop ${loop.loop_id}`);

  const results = await computeComponents(loop.components, t_h, options);
  return buildReport(checked, t_h, results, options);
}

/**
 * Evaluates loops independently under one set of options (and one deadline).
 * One loop's failure never affects another loop's report.
 */
export async function evaluateLoopBatchV1(
  queries: ReadonlyArray<LoopQuery>,
  input: EngineOptionsInput = {},
  registry: AggregationRegistry = defaultAggregationRegistry()
): Promise<LoopBatchItem[]> {
  return Promise.all(
    queries.map(async (q): Promise<LoopBatchItem> => {
      try {
        const report = await evaluateLoopSilV1(q.loop, q.t_h, q.pfd_method ? { ...input, pfd_method: q.pfd_method } : input, registry);
        return { ok: true, loop_id: q.loop.loop_id, report };
      } catch (err) {
        if (!isIntegrityError(err)) throw err;
        return { ok: false, loop_id: q.loop.loop_id, failure: toSilFailureV1(err, q.loop.loop_id, q.t_h) };
      }
    })
  );
}

/**
 * SIL(t) over a time grid. Points are evaluated in ascending order and each
 * component keeps one running Λ integral, so the grid costs about one pass over
 * [0, max t] rather than one integral per point.
 */
export async function evaluateLoopTrajectoryV1(
  loop: Loop,
  times_h: ReadonlyArray<number>,
  input: EngineOptionsInput = {},
  registry: AggregationRegistry = defaultAggregationRegistry()
): Promise<SilTrajectoryV1> {
  const options = resolveEngineOptions(input);
  if (times_h.length === 0) {
    throw new InputError("QUERY_TIME_INVALID", `trajectory for loop ${loop.loop_id} needs at least one time point`);
  }
  for (const t of times_h) assertQueryTime(t, loop.loop_id);
  const checked = assertLoopConfig(loop, registry);

  const caches = new Map<string, IncrementalCumulativeHazard>();
  for (const c of loop.components) caches.set(c.component_id, new IncrementalCumulativeHazard(c));

  const points: SilReportV1[] = [];
  let firstInvalid: number | null = null;
  for (const t of [...times_h].sort((x, y) => x - y)) {
    throwIfCancelled(options.cancellation, `loop ${loop.loop_id} at t=${t}h`);
    const results = await computeComponents(loop.components, t, options, caches);
    const report = buildReport(checked, t, results, options);
    if (!report.valid && firstInvalid === null) firstInvalid = t;
    points.push(report);
  }

  return SilTrajectoryV1Z.parse({
    type: "sil_trajectory_v1",
    schema_version: SIL_SCHEMA_VERSION,
    loop_id: loop.loop_id,
    points,
    first_invalid_t_h: firstInvalid
  });
}

export function toSilFailureV1(err: IntegrityError, loopId: string, t_h: number | null): SilFailureV1 {
  return parseSilFailureV1({
    type: "sil_failure_v1",
    schema_version: SIL_SCHEMA_VERSION,
    loop_id: loopId,
    query_t_h: t_h !== null && Number.isFinite(t_h) ? t_h : null,
    error_kind: err.kind,
    error_code: err.code,
    component_id: err.componentId,
    message: err.message
  });
}
