// Shared builders and assertions for the integrity-kernel acceptance scripts.

import assert from "node:assert";

import { IntegrityError, type IntegrityErrorKind } from "../errors/integrity_errors";
import { MultiplicativeHazardModel } from "../hazard/hazard_model";
import type { Component, Loop } from "../model/types";
import type { DegradationSignals } from "../signals/degradation_signals";
import { constantSeries, functionSeries } from "../signals/time_series";

/**
 * Nominal signals: age follows wall time, every multiplier neutral.
 */
export function nominalSignals(overrides: Partial<DegradationSignals> = {}): DegradationSignals {
  return {
    age_h: functionSeries((t) => t),
    cycle_count: constantSeries(0),
    environment_factor: constantSeries(1),
    stress_factor: constantSeries(1),
    maintenance_quality: constantSeries(1),
    diagnostic_coverage: constantSeries(0),
    ...overrides
  };
}

export function makeComponent(overrides: Partial<Component> = {}): Component {
  return {
    component_id: "PT-101",
    baseline_hazard_per_h: 1e-6,
    proof_test_interval_h: 8760,
    demand_mode: "low",
    mission_time_h: 87600,
    hazard_model: new MultiplicativeHazardModel(),
    signals: nominalSignals(),
    ...overrides
  };
}

export function makeLoop(components: Component[], overrides: Partial<Loop> = {}): Loop {
  return {
    loop_id: "LOOP-PT-101",
    architecture: "series",
    target_sil: 2,
    components,
    ...overrides
  };
}

export function assertClose(actual: number, expected: number, relTol: number, label: string): void {
  const scale = Math.max(Math.abs(expected), Number.MIN_VALUE);
  assert.ok(Math.abs(actual - expected) / scale <= relTol, `${label}: expected ${expected}, got ${actual}`);
}

function checkError(err: unknown, kind: IntegrityErrorKind, code: string, componentId?: string | null): void {
  assert.ok(err instanceof IntegrityError, `expected IntegrityError, got ${String(err)}`);
  assert.equal(err.kind, kind);
  assert.equal(err.code, code);
  if (componentId !== undefined) assert.equal(err.componentId, componentId);
}

// Helper: expect a function to throw an IntegrityError with the given kind/code.
export function expectIntegrityError(fn: () => unknown, kind: IntegrityErrorKind, code: string, componentId?: string | null): void {
  let threw = false;
  try {
    fn();
  } catch (err) {
    threw = true;
    checkError(err, kind, code, componentId);
  }
  assert.ok(threw, `expected ${kind} ${code}, but no error was thrown`);
}

export async function expectIntegrityRejection(
  promise: Promise<unknown>,
  kind: IntegrityErrorKind,
  code: string,
  componentId?: string | null
): Promise<void> {
  let threw = false;
  try {
    await promise;
  } catch (err) {
    threw = true;
    checkError(err, kind, code, componentId);
  }
  assert.ok(threw, `expected ${kind} ${code}, but the promise resolved`);
}
