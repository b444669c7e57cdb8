// Integrity Kernel - cancellation and deadlines
//
// Quadrature is synchronous, so a timer-driven AbortSignal cannot fire while it
// runs. The token therefore carries both an AbortSignal (observed between
// components) and an absolute wall-clock deadline (observed on every integrand
// evaluation).

import { NUMERICAL_DEADLINE_EXCEEDED, NumericalError } from "../errors/integrity_errors";

export type CancellationToken = {
  readonly signal?: AbortSignal;
  // Epoch milliseconds after which work must stop.
  readonly deadline_ts?: number;
};

export function isCancelled(token: CancellationToken | undefined, nowMs: number = Date.now()): boolean {
  if (!token) return false;
  if (token.signal?.aborted) return true;
  return token.deadline_ts !== undefined && nowMs > token.deadline_ts;
}

export function throwIfCancelled(token: CancellationToken | undefined, context: string): void {
  if (isCancelled(token)) {
    throw new NumericalError(NUMERICAL_DEADLINE_EXCEEDED, `computation cancelled or past deadline during ${context}`);
  }
}

/**
 * Lets pending timers and aborts run before the next synchronous chunk of work.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
