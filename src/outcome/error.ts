import type { Failure } from "./failure";

/**
 * Thrown by action handlers and lexers; the dispatcher turns it back into a Fail.
 */
export class CalcError extends Error {
  readonly failure: Failure;

  constructor(failure: Failure) {
    super(failure.message);
    this.name = "CalcError";
    this.failure = failure;
  }
}

export function isCalcError(e: unknown): e is CalcError {
  return e instanceof CalcError;
}
