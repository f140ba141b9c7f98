// src/catalog/trig.ts
// Trigonometric functions, in the current angle unit

import type { InterpreterMode } from "../core/eval/state";
import type { KeyedAction } from "../registry/types";
import { angleUnits, checked, command, domainUnless, fromRadians, realArg, realValue, toRadians, unary } from "./helpers";

const CATEGORY = "Trigonometric Functions";

function forward(key: string, fn: (x: number) => number, summary: string): KeyedAction {
  return unary(CATEGORY, { key, summary, synopsis: `x, ... → ${key}(x), ...` },
    (x, state) => realValue(checked(fn(toRadians(realArg(x, key), state.mode)), key)));
}

function inverse(key: string, fn: (x: number) => number, summary: string, bounded: boolean): KeyedAction {
  return unary(CATEGORY, {
    key,
    summary,
    synopsis: `x, ... → ${key}(x), ...`,
    detail: "The result carries the angle units, degs or rads.",
  }, (x, state) => {
    const arg = realArg(x, key);
    if (bounded) domainUnless(Math.abs(arg) <= 1, key);
    return realValue(fromRadians(fn(arg), state.mode), angleUnits(state.mode));
  });
}

function setAngleUnit(key: string, angleUnit: InterpreterMode["angleUnit"]): KeyedAction {
  return command(CATEGORY, { key, summary: `use ${angleUnit}` }, state => {
    state.mode = { ...state.mode, angleUnit };
  });
}

export const trigActions: KeyedAction[] = [
  forward("sin", Math.sin, "trigonometric sine"),
  forward("cos", Math.cos, "trigonometric cosine"),
  forward("tan", Math.tan, "trigonometric tangent"),
  inverse("asin", Math.asin, "trigonometric arc sine", true),
  inverse("acos", Math.acos, "trigonometric arc cosine", true),
  inverse("atan", Math.atan, "trigonometric arc tangent", false),
  setAngleUnit("rads", "radians"),
  setAngleUnit("degs", "degrees"),
];
