// Integrity Kernel - error taxonomy
//
// Every fatal failure of a SIL(t) query is one of three kinds. Codes are stable,
// machine-readable strings; messages are for humans only.
//
// GuardTriggered is not an error: it is recorded on the result
// (see hazard/signal_guards.ts) and never aborts a computation.

import type { ErrorKindV1 } from "@siltime/contracts";

export type IntegrityErrorKind = ErrorKindV1;

export const NUMERICAL_DEADLINE_EXCEEDED = "NUMERICAL_DEADLINE_EXCEEDED";

const NON_RETRYABLE_NUMERICAL_CODES: ReadonlySet<string> = new Set([NUMERICAL_DEADLINE_EXCEEDED, "HAZARD_RATE_INVALID", "SIL_VALUE_INVALID"]);

export abstract class IntegrityError extends Error {
  public abstract readonly kind: IntegrityErrorKind;
  public readonly code: string;
  public readonly reason: string;
  public readonly componentId: string | null;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(code: string, reason: string, componentId: string | null, details: Record<string, unknown>) {
    super(componentId ? `${code}: ${reason} @ component:${componentId}` : `${code}: ${reason}`);
    this.code = code;
    this.reason = reason;
    this.componentId = componentId;
    this.details = Object.freeze({ ...details });
  }

  /**
   * Returns the same error attributed to a component. Errors that already name
   * a component keep it.
   */
  abstract withComponent(componentId: string): IntegrityError;
}

/** A required degradation signal is missing or undefined at the requested time. */
export class InputError extends IntegrityError {
  public readonly kind = "InputError";

  constructor(code: string, reason: string, componentId: string | null = null, details: Record<string, unknown> = {}) {
    super(code, reason, componentId, details);
    this.name = "InputError";
  }

  withComponent(componentId: string): InputError {
    if (this.componentId) return this;
    return new InputError(this.code, this.reason, componentId, { ...this.details });
  }
}

/** Integration did not converge within its budget, or ran past its deadline. */
export class NumericalError extends IntegrityError {
  public readonly kind = "NumericalError";

  constructor(code: string, reason: string, componentId: string | null = null, details: Record<string, unknown> = {}) {
    super(code, reason, componentId, details);
    this.name = "NumericalError";
  }

  /**
   * Only quadrature failures earn the relaxed retry. Deadline expiry is final,
   * and an invalid hazard rate or band value comes out the same under any
   * tolerance.
   */
  get retryable(): boolean {
    return !NON_RETRYABLE_NUMERICAL_CODES.has(this.code);
  }

  withComponent(componentId: string): NumericalError {
    if (this.componentId) return this;
    return new NumericalError(this.code, this.reason, componentId, { ...this.details });
  }
}

/** Invalid architecture tag, target level, proof-test interval, or other configuration. */
export class ConfigError extends IntegrityError {
  public readonly kind = "ConfigError";

  constructor(code: string, reason: string, componentId: string | null = null, details: Record<string, unknown> = {}) {
    super(code, reason, componentId, details);
    this.name = "ConfigError";
  }

  withComponent(componentId: string): ConfigError {
    if (this.componentId) return this;
    return new ConfigError(this.code, this.reason, componentId, { ...this.details });
  }
}

export function isIntegrityError(err: unknown): err is IntegrityError {
  return err instanceof IntegrityError;
}
