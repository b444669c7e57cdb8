// Integrity Kernel - component and loop configuration
//
// Configuration is owned by the caller and read-only during a computation pass.
// Every constant the hazard model needs (baseline included) lives on the
// component itself.

import type { DemandModeV1, PfdMethodV1, SilLevelV1 } from "@siltime/contracts";
import type { HazardRateModel } from "../hazard/hazard_model";
import type { DegradationSignals } from "../signals/degradation_signals";

export type DemandMode = DemandModeV1;
export type SilLevel = SilLevelV1;
export type PfdMethod = PfdMethodV1;

export interface Component {
  readonly component_id: string;

  // λ0, 1/hour.
  readonly baseline_hazard_per_h: number;

  // T, hours between functional tests that restore the component.
  readonly proof_test_interval_h: number;

  readonly demand_mode: DemandMode;

  // Horizon over which this component's analysis is valid, hours.
  readonly mission_time_h: number;

  readonly hazard_model: HazardRateModel;

  readonly signals: DegradationSignals;
}

export interface Loop {
  readonly loop_id: string;

  // Aggregation strategy tag; "series" is the only one shipped.
  readonly architecture: string;

  // Required integrity level, 0..4.
  readonly target_sil: number;

  readonly components: ReadonlyArray<Component>;
}
