// @siltime/integrity-kernel
// Entry point exports for the SIL(t) computation kernel.

export * from "./kernel";
export * from "./errors/integrity_errors";
export * from "./model/types";
export * from "./model/assert_loop";
export * from "./options/cancellation";
export * from "./options/engine_options";
export * from "./signals/time_series";
export * from "./signals/degradation_signals";
export * from "./hazard/hazard_model";
export * from "./hazard/signal_guards";
export * from "./hazard/compute_hazard";
export * from "./reliability/quadrature";
export * from "./reliability/cumulative_hazard";
export * from "./integrity/pfd_avg";
export * from "./integrity/component_integrity";
export * from "./aggregation/aggregation_strategy";
export * from "./banding/sil_bands";
export * from "./mission/mission_time";
export * from "./validity/validity_checker";
