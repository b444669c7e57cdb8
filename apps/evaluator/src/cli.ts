#!/usr/bin/env node
/**
 * Offline SIL(t) evaluation of one query file.
 *
 * Prints the report (or failure envelope) as JSON. Exit code 0 when the loop
 * meets its target SIL at the query time, 2 when it is evaluated but not valid,
 * 1 on any failure.
 *
 * Usage:
 *   npm run evaluate-file -- --file ./packages/loop-admission/fixtures/sil_query_ok_001.json --t 8760
 *   npm run evaluate-file -- --file ./query.json --method exact --config ./config/evaluator/default.json
 *
 * --method applies only when the query file sets no pfd_method of its own.
 */

import path from "node:path";

import { PfdMethodV1Z } from "@siltime/contracts";
import { type SilQueryFileEvaluationV1, evaluateSilQueryFile } from "@siltime/loop-admission";
import { engineOptionsFromConfig, loadEvaluatorConfig } from "./config";
import { nowMs, parseFiniteNumber } from "./util";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function exitCodeFor(result: SilQueryFileEvaluationV1): number {
  if (result.status !== "ADMITTED" || !result.ok) return 1;
  return result.report.valid ? 0 : 2;
}

/* -------------------- main -------------------- */

async function main(): Promise<void> {
  if (flag("--help")) {
    console.log("usage: evaluate-file --file <query.json> [--t <hours>] [--method auto|exact|approx] [--config <path>]");
    return;
  }

  const file = arg("--file") ?? die("missing --file <query.json>");
  const tRaw = arg("--t");
  const methodRaw = arg("--method");
  const configPath = arg("--config");

  let t_h: number | undefined;
  if (tRaw !== null) {
    try {
      t_h = parseFiniteNumber(tRaw, "--t");
    } catch (e) {
      die(e instanceof Error ? e.message : String(e));
    }
  }

  const method = methodRaw === null ? undefined : PfdMethodV1Z.safeParse(methodRaw);
  if (method && !method.success) die(`invalid --method ${methodRaw}; expected auto, exact or approx`);

  const config = loadEvaluatorConfig(configPath ? { configPath } : {});
  const engine = engineOptionsFromConfig(config, { deadline_ts: nowMs() + config.engine.deadline_ms });
  const result = await evaluateSilQueryFile(path.resolve(file), {
    t_h,
    engine: method?.success ? { ...engine, pfd_method: method.data } : engine
  });

  console.log(JSON.stringify(result, null, 2));
  process.exitCode = exitCodeFor(result);
}

main().catch((err) => {
  die(err instanceof Error ? (err.stack ?? err.message) : String(err));
});
