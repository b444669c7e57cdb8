// Integrity Kernel - ValidityChecker
//
// valid iff SIL(t) ≥ target AND t ≤ mission time. Every failed gate is reported.

import type { ValidityReasonV1 } from "@siltime/contracts";
import type { SilLevel } from "../model/types";

export type ValidityResult = {
  readonly valid: boolean;
  readonly reasons: ReadonlyArray<ValidityReasonV1>;
};

export function silValid(sil: SilLevel, targetSil: SilLevel): boolean {
  return sil >= targetSil;
}

export function checkValidity(sil: SilLevel, targetSil: SilLevel, t: number, missionTimeH: number): ValidityResult {
  const reasons: ValidityReasonV1[] = [];
  if (!silValid(sil, targetSil)) {
    reasons.push({ code: "SIL_BELOW_TARGET", sil, target_sil: targetSil });
  }
  if (!(t <= missionTimeH)) {
    reasons.push({ code: "BEYOND_MISSION_TIME", t_h: t, mission_time_h: missionTimeH });
  }
  return Object.freeze({ valid: reasons.length === 0, reasons: Object.freeze(reasons) });
}
