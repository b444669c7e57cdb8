// Integrity Kernel - time series accessors
//
// A degradation signal is a pure function of time (hours). `undefined` means the
// signal has no value at t; callers turn that into an InputError.

/**
 * One degradation signal, evaluable at arbitrary t within its analyzed horizon.
 */
export interface TimeSeries {
  evaluate(t: number): number | undefined;
}

export type SeriesSample = { readonly t_h: number; readonly value: number };

export type Extrapolation = "none" | "hold";

/**
 * Series with the same value at every t.
 */
export function constantSeries(value: number): TimeSeries {
  return Object.freeze({ evaluate: (_t: number) => value });
}

/**
 * Wraps an arbitrary function of time. Non-finite results read as undefined.
 */
export function functionSeries(fn: (t: number) => number): TimeSeries {
  return Object.freeze({
    evaluate: (t: number) => {
      const v = fn(t);
      return Number.isFinite(v) ? v : undefined;
    }
  });
}

/**
 * Piecewise-linear interpolation over strictly increasing samples.
 *
 * With `none`, t outside [first.t_h, last.t_h] is undefined; with `hold`, the edge
 * values extend outward. A single sample under `hold` is a constant.
 */
export function sampledSeries(samples: ReadonlyArray<SeriesSample>, extrapolation: Extrapolation = "none"): TimeSeries {
  if (samples.length === 0) {
    throw new RangeError("sampledSeries needs at least one sample");
  }
  for (let i = 1; i < samples.length; i++) {
    if (!(samples[i].t_h > samples[i - 1].t_h)) {
      throw new RangeError(`samples must be strictly increasing in t_h (index ${i})`);
    }
  }

  // Copy so later mutation of the caller's array cannot change the series.
  const ts = samples.map((s) => s.t_h);
  const vs = samples.map((s) => s.value);
  const last = ts.length - 1;

  const evaluate = (t: number): number | undefined => {
    if (!Number.isFinite(t)) return undefined;
    if (t < ts[0]) return extrapolation === "hold" ? vs[0] : undefined;
    if (t > ts[last]) return extrapolation === "hold" ? vs[last] : undefined;
    if (t === ts[last]) return vs[last];

    // Binary search for the segment [ts[lo], ts[lo + 1]) containing t.
    let lo = 0;
    let hi = last;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (ts[mid] <= t) lo = mid;
      else hi = mid;
    }
    const w = (t - ts[lo]) / (ts[hi] - ts[lo]);
    return vs[lo] + w * (vs[hi] - vs[lo]);
  };

  return Object.freeze({ evaluate });
}
