// Loop-file harness: explicit query file loading + admission + kernel evaluation.
//
// File IO (fs) lives here and in the evaluator app; the integrity kernel stays IO-free.

import fs from "node:fs"; // Harness-only file IO for query documents.
import crypto from "node:crypto"; // Deterministic hashing for an offline-recomputable input_ref.

import type { SilFailureV1, SilReportV1 } from "@siltime/contracts";
import {
  type AggregationRegistry,
  ConfigError,
  type EngineOptionsInput,
  type IntegrityError,
  defaultAggregationRegistry,
  evaluateLoopSilV1,
  isIntegrityError,
  toSilFailureV1
} from "@siltime/integrity-kernel";
import { type AdmittedSilQueryV1, admitSilQueryV1, queryHints } from "../admission/sil_query_admission";

export type SilQueryLoadStatusV1 = "ADMITTED" | "MISSING" | "INVALID";

export type SilQueryLoadResultV1 =
  | { status: "ADMITTED"; input_ref: string; admitted: AdmittedSilQueryV1 }
  | { status: "MISSING"; input_ref: "MISSING" }
  | { status: "INVALID"; input_ref: string; error: IntegrityError; loop_id: string; t_h: number | null };

export type SilQueryFileEvaluationV1 =
  | { status: "ADMITTED"; input_ref: string; ok: true; report: SilReportV1 }
  | { status: "ADMITTED"; input_ref: string; ok: false; failure: SilFailureV1 }
  | { status: "MISSING"; input_ref: "MISSING" }
  | { status: "INVALID"; input_ref: string; failure: SilFailureV1 };

export type EvaluateSilQueryFileOptions = {
  t_h?: number; // overrides the query time stored in the file
  engine?: EngineOptionsInput;
  registry?: AggregationRegistry;
};

function sha256Hex(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

export function inputRefFromBytes(bytes: Buffer): string {
  return `sha256:${sha256Hex(bytes)}`; // Input ref: stable, offline recomputable.
}

export function loadSilQueryFromFile(filePath: string, registry: AggregationRegistry = defaultAggregationRegistry()): SilQueryLoadResultV1 {
  // Loading is explicit: caller must pass the exact path. No directory scanning.
  if (!fs.existsSync(filePath)) {
    return { status: "MISSING", input_ref: "MISSING" };
  }

  const bytes = fs.readFileSync(filePath); // Exact bytes for a deterministic ref.
  const input_ref = inputRefFromBytes(bytes);

  let json: unknown;
  try {
    json = JSON.parse(bytes.toString("utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return { status: "INVALID", input_ref, error: new ConfigError("CONFIG_JSON_INVALID", reason), loop_id: "UNKNOWN", t_h: null };
  }

  try {
    return { status: "ADMITTED", input_ref, admitted: admitSilQueryV1(json, registry) };
  } catch (e) {
    if (!isIntegrityError(e)) throw e;
    return { status: "INVALID", input_ref, error: e, ...queryHints(json) };
  }
}

export async function evaluateSilQueryFile(filePath: string, options: EvaluateSilQueryFileOptions = {}): Promise<SilQueryFileEvaluationV1> {
  const registry = options.registry ?? defaultAggregationRegistry();
  const loaded = loadSilQueryFromFile(filePath, registry);

  if (loaded.status === "MISSING") return loaded;
  if (loaded.status === "INVALID") {
    return { status: "INVALID", input_ref: loaded.input_ref, failure: toSilFailureV1(loaded.error, loaded.loop_id, loaded.t_h) };
  }

  const { admitted, input_ref } = loaded;
  const t_h = options.t_h ?? admitted.t_h;
  const engine: EngineOptionsInput = { ...options.engine, pfd_method: admitted.pfd_method ?? options.engine?.pfd_method };
  try {
    const report = await evaluateLoopSilV1(admitted.loop, t_h, engine, registry);
    return { status: "ADMITTED", input_ref, ok: true, report };
  } catch (e) {
    if (!isIntegrityError(e)) throw e;
    return { status: "ADMITTED", input_ref, ok: false, failure: toSilFailureV1(e, admitted.loop.loop_id, t_h) };
  }
}
