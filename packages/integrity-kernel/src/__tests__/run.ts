// Minimal test runner for @siltime/integrity-kernel.
//
// Plain tsx-executed scripts that throw on failure; each imported module runs
// its checks at load time, in order.

import "./no_io_exports";
import "./hazard_cases";
import "./quadrature_cases";
import "./banding_cases";
import "./loop_cases";

console.log("integrity-kernel tests ok");
