import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function newId(prefix: string): string {
  // deterministic IDs are not required; uniqueness is.
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export function parseFiniteNumber(v: unknown, name: string): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim().length > 0 ? Number(v) : NaN;
  if (!Number.isFinite(n)) throw new Error(`invalid ${name}`);
  return n;
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * SSOT files (config/evaluator/default.json) live at the repo root, while the
 * process may start from the root or from apps/evaluator.
 *
 * Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
