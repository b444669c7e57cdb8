// Integrity Kernel - adaptive Simpson quadrature
//
// λ(t) is generally not closed-form (it is derived from sampled, interpolated
// signals), so every integral in the kernel goes through this routine.
//
// The interval is first cut into `initial_panels` uniform panels so that
// features narrower than the whole interval are not missed by the first
// five-point estimate; each panel is then refined adaptively with an explicit
// stack. Failure to converge inside the depth or evaluation budget is a
// NumericalError, never a silently truncated value.

import { NUMERICAL_DEADLINE_EXCEEDED, NumericalError } from "../errors/integrity_errors";
import { type CancellationToken, isCancelled } from "../options/cancellation";

export type QuadratureOptions = {
  // Per-segment acceptance: |S2 − S1| ≤ 15 · max(absolute share, relative_tolerance · |S2|).
  readonly relative_tolerance: number;
  readonly absolute_tolerance: number;
  readonly max_depth: number;
  readonly max_evaluations: number;
  readonly initial_panels: number;
};

export type QuadratureResult = {
  readonly value: number;
  readonly evaluations: number;
  readonly error_estimate: number;
};

type Segment = {
  a: number;
  b: number;
  fa: number;
  fm: number;
  fb: number;
  whole: number;
  absTol: number;
  depth: number;
};

/**
 * Integrates f over [a, b].
 *
 * @throws NumericalError NUMERICAL_NOT_CONVERGED | NUMERICAL_BUDGET_EXHAUSTED |
 *   NUMERICAL_NON_FINITE | NUMERICAL_DEADLINE_EXCEEDED
 */
export function integrate(
  f: (x: number) => number,
  a: number,
  b: number,
  options: QuadratureOptions,
  cancellation?: CancellationToken
): QuadratureResult {
  if (!Number.isFinite(a) || !Number.isFinite(b) || b < a) {
    throw new NumericalError("NUMERICAL_INVALID_INTERVAL", `cannot integrate over [${a}, ${b}]`);
  }
  if (a === b) return { value: 0, evaluations: 0, error_estimate: 0 };

  let evaluations = 0;
  const evalAt = (x: number): number => {
    evaluations += 1;
    if (evaluations > options.max_evaluations) {
      throw new NumericalError("NUMERICAL_BUDGET_EXHAUSTED", `quadrature exceeded ${options.max_evaluations} evaluations`, null, {
        interval: [a, b]
      });
    }
    if (isCancelled(cancellation)) {
      throw new NumericalError(NUMERICAL_DEADLINE_EXCEEDED, "quadrature cancelled or past deadline", null, {
        evaluations
      });
    }
    const y = f(x);
    if (!Number.isFinite(y)) {
      throw new NumericalError("NUMERICAL_NON_FINITE", `integrand is not finite at x=${x}`, null, { x });
    }
    return y;
  };

  const panels = Math.max(1, Math.floor(options.initial_panels));
  const width = (b - a) / panels;
  const stack: Segment[] = [];

  let left = a;
  let fLeft = evalAt(left);
  for (let i = 0; i < panels; i++) {
    const right = i === panels - 1 ? b : a + (i + 1) * width;
    const mid = (left + right) / 2;
    const fMid = evalAt(mid);
    const fRight = evalAt(right);
    stack.push({
      a: left,
      b: right,
      fa: fLeft,
      fm: fMid,
      fb: fRight,
      whole: simpson(left, right, fLeft, fMid, fRight),
      absTol: options.absolute_tolerance / panels,
      depth: 0
    });
    left = right;
    fLeft = fRight;
  }

  let total = 0;
  let compensation = 0;
  let errorEstimate = 0;

  while (stack.length > 0) {
    const seg = stack.pop();
    if (!seg) break;

    const m = (seg.a + seg.b) / 2;
    const fLm = evalAt((seg.a + m) / 2);
    const fRm = evalAt((m + seg.b) / 2);
    const leftArea = simpson(seg.a, m, seg.fa, fLm, seg.fm);
    const rightArea = simpson(m, seg.b, seg.fm, fRm, seg.fb);
    const refined = leftArea + rightArea;
    const delta = refined - seg.whole;
    const tol = Math.max(seg.absTol, options.relative_tolerance * Math.abs(refined));

    if (Math.abs(delta) <= 15 * tol) {
      // Richardson extrapolation of the two Simpson estimates; Neumaier-compensated sum.
      const accepted = refined + delta / 15;
      const t = total + accepted;
      compensation += Math.abs(total) >= Math.abs(accepted) ? total - t + accepted : accepted - t + total;
      total = t;
      errorEstimate += Math.abs(delta) / 15;
      continue;
    }

    if (seg.depth >= options.max_depth) {
      throw new NumericalError("NUMERICAL_NOT_CONVERGED", `quadrature did not converge within depth ${options.max_depth}`, null, {
        segment: [seg.a, seg.b],
        delta
      });
    }

    const childTol = seg.absTol / 2;
    stack.push({ a: m, b: seg.b, fa: seg.fm, fm: fRm, fb: seg.fb, whole: rightArea, absTol: childTol, depth: seg.depth + 1 });
    stack.push({ a: seg.a, b: m, fa: seg.fa, fm: fLm, fb: seg.fm, whole: leftArea, absTol: childTol, depth: seg.depth + 1 });
  }

  return { value: total + compensation, evaluations, error_estimate: errorEstimate };
}

function simpson(a: number, b: number, fa: number, fm: number, fb: number): number {
  return ((b - a) / 6) * (fa + 4 * fm + fb);
}
