// src/catalog/helpers.ts
// Descriptor builders shared by the catalog families, plus the small
// numeric guards most handlers need.

import { CalcError } from "../outcome/error";
import { domainError, mathDomainError } from "../outcome/constructors";
import type { InterpreterMode, InterpreterState } from "../core/eval/state";
import { real, type Value } from "../core/values/value";
import type { ActionDoc, Arity, Handler, KeyedAction, PatternAction } from "../registry/types";

// =============================================================================
// Descriptor builders
// =============================================================================

interface KeyedSpec extends ActionDoc {
  key: string;
  aliases?: readonly string[];
  /** Defaults to the key */
  name?: string;
}

export function keyed(category: string, spec: KeyedSpec, arity: Arity, handler: Handler): KeyedAction {
  const { key, aliases = [], name = key, summary, synopsis, detail } = spec;
  return {
    kind: "keyed",
    name,
    key,
    aliases,
    category,
    arity,
    doc: { summary, synopsis, detail },
    handler,
  };
}

/** Replaces x with f(x). */
export function unary(
  category: string,
  spec: KeyedSpec,
  fn: (x: Value, state: InterpreterState) => Value
): KeyedAction {
  return keyed(category, spec, { pop: 1, push: 1 }, ([x], state) => [fn(x, state)]);
}

/** Replaces x and y with f(x, y). */
export function binary(
  category: string,
  spec: KeyedSpec,
  fn: (x: Value, y: Value, state: InterpreterState) => Value
): KeyedAction {
  return keyed(category, spec, { pop: 2, push: 1 }, ([x, y], state) => [fn(x, y, state)]);
}

/** Pushes a value without consuming anything. */
export function nullary(
  category: string,
  spec: KeyedSpec,
  fn: (state: InterpreterState) => Value
): KeyedAction {
  return keyed(category, spec, { pop: 0, push: 1 }, (_args, state) => [fn(state)]);
}

/** No stack effect; changes modes or prints. */
export function command(
  category: string,
  spec: KeyedSpec,
  run: (state: InterpreterState) => void
): KeyedAction {
  return keyed(category, spec, { pop: 0, push: 0 }, (_args, state) => {
    run(state);
    return [];
  });
}

interface PatternSpec extends ActionDoc {
  name: string;
  usage: string;
  pattern: RegExp;
}

export function pattern(category: string, spec: PatternSpec, arity: Arity, handler: Handler): PatternAction {
  const { name, usage, pattern: re, summary, synopsis, detail } = spec;
  return {
    kind: "pattern",
    name,
    usage,
    pattern: re,
    category,
    arity,
    doc: { summary, synopsis, detail },
    handler,
  };
}

// =============================================================================
// Numeric guards
// =============================================================================

/** The real value of x; complex operands are rejected. */
export function realArg(v: Value, action: string): number {
  if (v.n.tag === "Complex") {
    throw new CalcError(domainError("Function does not support a complex argument.", action));
  }
  return v.n.x;
}

/** NaN means the function was undefined at this input. */
export function checked(x: number, action: string): number {
  if (Number.isNaN(x)) throw new CalcError(mathDomainError(action));
  return x;
}

export function domainUnless(ok: boolean, action: string): void {
  if (!ok) throw new CalcError(mathDomainError(action));
}

/** Units survive only when both operands agree on them. */
export function commonUnits(a: Value, b: Value): string {
  return a.units === b.units ? a.units : "";
}

export function realValue(x: number, units = ""): Value {
  return { n: real(x), units };
}

// =============================================================================
// Angles
// =============================================================================

export function toRadians(x: number, mode: InterpreterMode): number {
  return mode.angleUnit === "degrees" ? (x * Math.PI) / 180 : x;
}

export function fromRadians(x: number, mode: InterpreterMode): number {
  return mode.angleUnit === "degrees" ? (x * 180) / Math.PI : x;
}

export function angleUnits(mode: InterpreterMode): string {
  return mode.angleUnit === "degrees" ? "degs" : "rads";
}
