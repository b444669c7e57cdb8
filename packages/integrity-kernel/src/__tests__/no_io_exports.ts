// Negative acceptance: @siltime/integrity-kernel must stay a pure computation library.
//
// Loading inputs, reading files and logging belong to loop-admission and the
// evaluator service; none of that may leak into the kernel's public surface.

import assert from "node:assert";

import * as pkg from "../index";

const forbiddenNamePatterns: RegExp[] = [/load/i, /read.*file/i, /file/i, /fetch/i, /http/i, /logger/i, /server/i];

for (const k of Object.keys(pkg)) {
  for (const re of forbiddenNamePatterns) {
    assert.ok(!re.test(k), `forbidden export found in @siltime/integrity-kernel: ${k}`);
  }
}

console.log("integrity-kernel negative acceptance ok: no IO exports");
