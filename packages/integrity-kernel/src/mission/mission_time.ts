// Integrity Kernel - MissionTimeCalculator
//
// A loop is only as valid as its shortest-lived component.

import { ConfigError } from "../errors/integrity_errors";
import type { Loop } from "../model/types";

export function loopMissionTime(loop: Pick<Loop, "loop_id" | "components">): number {
  if (loop.components.length === 0) {
    throw new ConfigError("LOOP_EMPTY", `loop ${loop.loop_id} has no components`);
  }
  let min = Number.POSITIVE_INFINITY;
  for (const c of loop.components) {
    if (c.mission_time_h < min) min = c.mission_time_h;
  }
  return min;
}
