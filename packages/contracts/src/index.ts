export * from "./schema/common_v1";
export * from "./schema/degradation_signals_v1";
export * from "./schema/component_config_v1";
export * from "./schema/sil_query_v1";
export * from "./schema/sil_report_v1";
export * from "./schema/sil_failure_v1"; // failure envelope: consumed by admission and the evaluator
