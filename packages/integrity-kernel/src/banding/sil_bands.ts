// Integrity Kernel - SILMapper
//
// Bands are half-open [lower, upper): the lower bound belongs to the band, so
// PFDavg = 1e-4 is SIL 3 and PFH = 1e-8 is SIL 3. Together with the SIL 4 floor
// clamp the five bands cover [0, ∞).

import { ConfigError, NumericalError } from "../errors/integrity_errors";
import type { DemandMode, SilLevel } from "../model/types";

export type SilBand = {
  readonly sil: SilLevel;
  readonly lower: number;
  // null = unbounded.
  readonly upper: number | null;
};

export type SilClassification = {
  readonly sil: SilLevel;
  // The value is better than the SIL 4 band; it is reported as SIL 4.
  readonly below_sil4_floor: boolean;
};

function freezeBands(bands: SilBand[]): ReadonlyArray<SilBand> {
  return Object.freeze(bands.map((b) => Object.freeze(b)));
}

export const LOW_DEMAND_BANDS: ReadonlyArray<SilBand> = freezeBands([
  { sil: 4, lower: 1e-5, upper: 1e-4 },
  { sil: 3, lower: 1e-4, upper: 1e-3 },
  { sil: 2, lower: 1e-3, upper: 1e-2 },
  { sil: 1, lower: 1e-2, upper: 1e-1 },
  { sil: 0, lower: 1e-1, upper: null }
]);

export const HIGH_DEMAND_BANDS: ReadonlyArray<SilBand> = freezeBands([
  { sil: 4, lower: 1e-9, upper: 1e-8 },
  { sil: 3, lower: 1e-8, upper: 1e-7 },
  { sil: 2, lower: 1e-7, upper: 1e-6 },
  { sil: 1, lower: 1e-6, upper: 1e-5 },
  { sil: 0, lower: 1e-5, upper: null }
]);

export function bandsFor(mode: DemandMode): ReadonlyArray<SilBand> {
  return mode === "low" ? LOW_DEMAND_BANDS : HIGH_DEMAND_BANDS;
}

export function classifyIntegrityValue(value: number, mode: DemandMode): SilClassification {
  if (Number.isNaN(value) || value < 0) {
    throw new NumericalError("SIL_VALUE_INVALID", `cannot map ${value} to an integrity band`, null, { value, demand_mode: mode });
  }
  const bands = bandsFor(mode);
  for (const band of bands) {
    if (value >= band.lower && (band.upper === null || value < band.upper)) {
      return { sil: band.sil, below_sil4_floor: false };
    }
  }
  // Only values under the SIL 4 lower bound are left.
  return { sil: 4, below_sil4_floor: true };
}

export function mapToSil(value: number, mode: DemandMode): SilLevel {
  return classifyIntegrityValue(value, mode).sil;
}

export function silFromPfdAvg(pfdAvg: number): SilLevel {
  return mapToSil(pfdAvg, "low");
}

export function silFromPfh(pfh: number): SilLevel {
  return mapToSil(pfh, "high");
}

// Guards the tables at module load; a mis-edited boundary fails loudly.
for (const [mode, bands] of [
  ["low", LOW_DEMAND_BANDS],
  ["high", HIGH_DEMAND_BANDS]
] as const) {
  for (let i = 1; i < bands.length; i++) {
    const prev = bands[i - 1];
    const cur = bands[i];
    if (prev.upper !== cur.lower || prev.sil !== cur.sil + 1) {
      throw new ConfigError("SIL_BANDS_NOT_CONTIGUOUS", `${mode}-demand bands break between SIL ${prev.sil} and SIL ${cur.sil}`);
    }
  }
}
