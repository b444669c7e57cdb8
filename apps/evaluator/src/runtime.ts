import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";

import type { SilFailureV1, SilReportV1, SilTrajectoryV1 } from "@siltime/contracts";
import {
  type AggregationRegistry,
  HIGH_DEMAND_BANDS,
  type IntegrityError,
  LOW_DEMAND_BANDS,
  type LoopBatchItem,
  type LoopQuery,
  NUMERICAL_DEADLINE_EXCEEDED,
  SIL_SCHEMA_VERSION,
  defaultAggregationRegistry,
  evaluateLoopBatchV1,
  evaluateLoopSilV1,
  evaluateLoopTrajectoryV1,
  isIntegrityError,
  toSilFailureV1
} from "@siltime/integrity-kernel";
import { admitSilQueryV1, admitSilTrajectoryQueryV1, queryHints } from "@siltime/loop-admission";

import { type EvaluatorConfigV1, engineOptionsFromConfig } from "./config";
import { newId, nowMs } from "./util";

export type Outcome<T> = { ok: true; body: T } | { ok: false; status: number; failure: SilFailureV1 };

export type BatchResponseV1 = {
  batch_id: string;
  created_at_ts: number;
  results: LoopBatchItem[];
  summary: { total: number; ok: number; failed: number };
};

export class RequestRejected extends Error {
  public readonly status = 400;

  constructor(
    public readonly error_code: string,
    message: string
  ) {
    super(message);
    this.name = "RequestRejected";
  }
}

const BatchRequestZ = z.object({ queries: z.array(z.unknown()).min(1) }).strict();

/**
 * HTTP status for a failed query: configuration problems are the caller's
 * request (400), unusable signals are unprocessable input (422), numerical
 * failures are ours (500) unless the deadline ran out (504).
 */
export function httpStatusForFailure(failure: Pick<SilFailureV1, "error_kind" | "error_code">): number {
  switch (failure.error_kind) {
    case "ConfigError":
      return 400;
    case "InputError":
      return 422;
    case "NumericalError":
      return failure.error_code === NUMERICAL_DEADLINE_EXCEEDED ? 504 : 500;
    default: {
      const _never: never = failure.error_kind;
      throw new Error(`unknown error kind ${String(_never)}`);
    }
  }
}

export class EvaluatorRuntime {
  private readonly registry: AggregationRegistry;

  constructor(
    private readonly config: EvaluatorConfigV1,
    private readonly log: FastifyBaseLogger,
    registry?: AggregationRegistry
  ) {
    this.registry = registry ?? defaultAggregationRegistry();
  }

  async evaluate(body: unknown): Promise<Outcome<SilReportV1>> {
    const hints = queryHints(body);
    try {
      const admitted = admitSilQueryV1(body, this.registry);
      const engine = engineOptionsFromConfig(this.config, { deadline_ts: nowMs() + this.config.engine.deadline_ms });
      const report = await evaluateLoopSilV1(
        admitted.loop,
        admitted.t_h,
        { ...engine, pfd_method: admitted.pfd_method ?? engine.pfd_method },
        this.registry
      );
      this.logReport(report);
      return { ok: true, body: report };
    } catch (e) {
      return this.failed(e, hints.loop_id, hints.t_h);
    }
  }

  async batch(body: unknown): Promise<BatchResponseV1> {
    const parsed = BatchRequestZ.safeParse(body);
    if (!parsed.success) {
      throw new RequestRejected("BATCH_SCHEMA_INVALID", "batch body must be { queries: [sil_query_v1, ...] }");
    }
    const { queries } = parsed.data;
    if (queries.length > this.config.batch.max_loops) {
      throw new RequestRejected("BATCH_TOO_LARGE", `batch holds ${queries.length} loops; the limit is ${this.config.batch.max_loops}`);
    }

    // Admission is per loop: one malformed query fails alone.
    const slots = queries.map((q): LoopBatchItem | LoopQuery => {
      const hints = queryHints(q);
      try {
        const admitted = admitSilQueryV1(q, this.registry);
        return { loop: admitted.loop, t_h: admitted.t_h, pfd_method: admitted.pfd_method };
      } catch (e) {
        if (!isIntegrityError(e)) throw e;
        return { ok: false, loop_id: hints.loop_id, failure: toSilFailureV1(e, hints.loop_id, hints.t_h) };
      }
    });

    const pending = slots.filter(isLoopQuery);
    const engine = engineOptionsFromConfig(this.config, { deadline_ts: nowMs() + this.config.batch.deadline_ms });
    const evaluated = await evaluateLoopBatchV1(pending, engine, this.registry);

    let next = 0;
    const results = slots.map((slot) => (isLoopQuery(slot) ? evaluated[next++] : slot));
    for (const r of results) {
      if (r.ok) this.logReport(r.report);
      else this.logFailure(r.failure);
    }

    const ok = results.filter((r) => r.ok).length;
    return {
      batch_id: newId("silb"),
      created_at_ts: nowMs(),
      results,
      summary: { total: results.length, ok, failed: results.length - ok }
    };
  }

  async trajectory(body: unknown): Promise<Outcome<SilTrajectoryV1>> {
    const hints = queryHints(body);
    try {
      const admitted = admitSilTrajectoryQueryV1(body, this.registry);
      if (admitted.times_h.length > this.config.trajectory.max_points) {
        throw new RequestRejected(
          "TRAJECTORY_TOO_LARGE",
          `trajectory holds ${admitted.times_h.length} points; the limit is ${this.config.trajectory.max_points}`
        );
      }
      const engine = engineOptionsFromConfig(this.config, { deadline_ts: nowMs() + this.config.trajectory.deadline_ms });
      const trajectory = await evaluateLoopTrajectoryV1(
        admitted.loop,
        admitted.times_h,
        { ...engine, pfd_method: admitted.pfd_method ?? engine.pfd_method },
        this.registry
      );
      this.log.info(
        { loop_id: trajectory.loop_id, points: trajectory.points.length, first_invalid_t_h: trajectory.first_invalid_t_h },
        "sil trajectory evaluated"
      );
      return { ok: true, body: trajectory };
    } catch (e) {
      return this.failed(e, hints.loop_id, null);
    }
  }

  bands(): { schema_version: string; low: typeof LOW_DEMAND_BANDS; high: typeof HIGH_DEMAND_BANDS; architectures: string[] } {
    return {
      schema_version: SIL_SCHEMA_VERSION,
      low: LOW_DEMAND_BANDS,
      high: HIGH_DEMAND_BANDS,
      architectures: this.registry.architectures()
    };
  }

  private failed(e: unknown, loopId: string, t: number | null): { ok: false; status: number; failure: SilFailureV1 } {
    if (!isIntegrityError(e)) throw e;
    const failure = toSilFailureV1(e, loopId, t);
    this.logFailure(failure, e);
    return { ok: false, status: httpStatusForFailure(failure), failure };
  }

  private logReport(report: SilReportV1): void {
    this.log.info(
      {
        loop_id: report.loop_id,
        t_h: report.query_t_h,
        metric: report.metric,
        value: report.value,
        sil: report.sil,
        target_sil: report.target_sil,
        valid: report.valid
      },
      "sil evaluated"
    );
    if (report.degraded_confidence) {
      this.log.warn(
        { loop_id: report.loop_id, guards: report.guards.map((g) => `${g.component_id}:${g.code}`) },
        "degraded confidence: signal guards triggered"
      );
    }
  }

  private logFailure(failure: SilFailureV1, err?: IntegrityError): void {
    const fields = {
      loop_id: failure.loop_id,
      t_h: failure.query_t_h,
      error_kind: failure.error_kind,
      error_code: failure.error_code,
      component_id: failure.component_id,
      details: err?.details
    };
    if (failure.error_kind === "NumericalError") this.log.error(fields, failure.message);
    else this.log.warn(fields, failure.message);
  }
}

function isLoopQuery(slot: LoopBatchItem | LoopQuery): slot is LoopQuery {
  return "loop" in slot;
}
