// Integrity Kernel - signal guards (GuardTriggered)
//
// Guards repair signal values that would make λ unbounded or meaningless. They
// are non-fatal: the computation continues with the applied value and the
// result carries a degraded-confidence flag. Integration evaluates λ many times,
// so events are folded to one record per (code, signal).

import type { GuardCodeV1, GuardEventV1 } from "@siltime/contracts";
import type { DegradationSignalName, DegradationSnapshot } from "../signals/degradation_signals";
import type { GuardOptions } from "../options/engine_options";

export type GuardEvent = GuardEventV1;

export class GuardCollector {
  private readonly events = new Map<string, GuardEventV1>();

  constructor(public readonly componentId: string) {}

  record(code: GuardCodeV1, signal: DegradationSignalName, t: number, raw: number, applied: number): void {
    const key = `${code}:${signal}`;
    const prev = this.events.get(key);
    if (prev) {
      this.events.set(key, { ...prev, occurrences: prev.occurrences + 1 });
      return;
    }
    this.events.set(key, {
      code,
      component_id: this.componentId,
      signal,
      first_t_h: t,
      first_raw_value: raw,
      applied_value: applied,
      occurrences: 1
    });
  }

  get triggered(): boolean {
    return this.events.size > 0;
  }

  /** Events in a stable order (code, then signal). */
  snapshot(): ReadonlyArray<GuardEventV1> {
    return Object.freeze(
      [...this.events.values()]
        .sort((x, y) => (x.code === y.code ? x.signal.localeCompare(y.signal) : x.code.localeCompare(y.code)))
        .map((e) => Object.freeze({ ...e }))
    );
  }
}

/**
 * Applies the divisor floor and the coverage clamp, recording every repair.
 */
export function applySignalGuards(
  snapshot: DegradationSnapshot,
  t: number,
  options: GuardOptions,
  collector: GuardCollector
): DegradationSnapshot {
  let maintenance = snapshot.maintenance_quality;
  if (maintenance < options.maintenance_quality_floor) {
    collector.record("MAINTENANCE_QUALITY_FLOORED", "maintenance_quality", t, maintenance, options.maintenance_quality_floor);
    maintenance = options.maintenance_quality_floor;
  }

  let coverage = snapshot.diagnostic_coverage;
  if (coverage < 0 || coverage > 1) {
    const clamped = Math.min(1, Math.max(0, coverage));
    collector.record("DIAGNOSTIC_COVERAGE_CLAMPED", "diagnostic_coverage", t, coverage, clamped);
    coverage = clamped;
  }

  if (maintenance === snapshot.maintenance_quality && coverage === snapshot.diagnostic_coverage) return snapshot;
  return Object.freeze({ ...snapshot, maintenance_quality: maintenance, diagnostic_coverage: coverage });
}
