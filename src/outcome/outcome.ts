// src/outcome/outcome.ts
// Result of evaluating a line, token or lookup: a value or a Failure.
//
// Handlers deep in the catalog throw CalcError instead of threading
// Outcomes through every call; attempt() converts back at the boundary.

import type { Failure } from "./failure";
import { CalcError, isCalcError } from "./error";

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}

// =========================================================================
// Combinators
// =========================================================================

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (value: A) => R;
    fail: (failure: Failure) => R;
  }
): R {
  return isDone(outcome) ? handlers.done(outcome.value) : handlers.fail(outcome.failure);
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  return isDone(o) ? { tag: "Done", value: fn(o.value) } : o;
}

/**
 * The value, or the failure rethrown as a CalcError so the dispatcher
 * can locate it at the current token.
 */
export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) return o.value;
  throw new CalcError(o.failure);
}

export function unwrapOr<A>(o: Outcome<A>, fallback: A): A {
  return isDone(o) ? o.value : fallback;
}

/**
 * Run fn, turning a thrown CalcError into a Fail.
 * Anything else thrown is a bug and propagates.
 */
export function attempt<A>(fn: () => A): Outcome<A> {
  try {
    return { tag: "Done", value: fn() };
  } catch (e) {
    if (isCalcError(e)) return { tag: "Fail", failure: e.failure };
    throw e;
  }
}
