// @siltime/loop-admission
// Query admission (wire contracts -> kernel loops) and the explicit loop-file harness.
//
// File IO (fs) is allowed here and in apps; integrity-kernel must remain IO-free.

export * from "./signals/signal_series";
export * from "./admission/sil_query_admission";
export * from "./harness/sil_query_file_harness";
