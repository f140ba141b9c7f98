// src/catalog/powers.ts
// Powers, roots, exponentials and logarithms.
// Logs and roots of negative reals come back complex.

import { CalcError } from "../outcome/error";
import { divisionByZero, mathDomainError } from "../outcome/constructors";
import * as C from "../core/values/complex";
import { real, realPart, type Scalar, type Value } from "../core/values/value";
import type { KeyedAction } from "../registry/types";
import { binary, realArg, realValue, unary } from "./helpers";

const CATEGORY = "Powers, Roots, Exponentials and Logarithms";

function logBase(x: Value, action: string, base: number, realLog: (x: number) => number): Scalar {
  if (C.isZero(x.n)) throw new CalcError(mathDomainError(action));
  if (x.n.tag === "Real" && x.n.x > 0) return real(realLog(x.n.x));
  return C.div(C.log(x.n), real(Math.log(base)));
}

function power(base: Scalar, exponent: Scalar): Scalar {
  if (C.isZero(base) && realPart(exponent) < 0) throw new CalcError(divisionByZero());
  return C.pow(base, exponent);
}

export const powerActions: KeyedAction[] = [
  binary(CATEGORY, {
    key: "**",
    aliases: ["pow", "ytox"],
    summary: "raise y to the power of x",
    synopsis: "x, y, ... → y**x, ...",
    detail: "A negative y raised to a fractional x gives the principal complex root.",
  }, (x, y) => ({ n: power(y.n, x.n), units: "" })),

  unary(CATEGORY, {
    key: "exp",
    aliases: ["powe"],
    summary: "natural exponential",
    synopsis: "x, ... → exp(x), ...",
  }, x => ({ n: C.exp(x.n), units: "" })),

  unary(CATEGORY, {
    key: "ln",
    aliases: ["loge"],
    summary: "natural logarithm",
    synopsis: "x, ... → ln(x), ...",
  }, x => ({ n: logBase(x, "ln", Math.E, Math.log), units: "" })),

  unary(CATEGORY, {
    key: "pow10",
    aliases: ["10tox"],
    summary: "raise 10 to the power of x",
    synopsis: "x, ... → 10**x, ...",
  }, x => ({ n: power(real(10), x.n), units: "" })),

  unary(CATEGORY, {
    key: "log",
    aliases: ["log10", "lg"],
    summary: "base 10 logarithm",
    synopsis: "x, ... → log(x), ...",
  }, x => ({ n: logBase(x, "log", 10, Math.log10), units: "" })),

  unary(CATEGORY, {
    key: "pow2",
    aliases: ["2tox"],
    summary: "raise 2 to the power of x",
    synopsis: "x, ... → 2**x, ...",
  }, x => ({ n: power(real(2), x.n), units: "" })),

  unary(CATEGORY, {
    key: "log2",
    aliases: ["lb"],
    summary: "base 2 logarithm",
    synopsis: "x, ... → log2(x), ...",
  }, x => ({ n: logBase(x, "log2", 2, Math.log2), units: "" })),

  unary(CATEGORY, {
    key: "sqr",
    summary: "square",
    synopsis: "x, ... → x**2, ...",
  }, x => ({ n: C.mul(x.n, x.n), units: "" })),

  unary(CATEGORY, {
    key: "sqrt",
    aliases: ["rt"],
    summary: "square root",
    synopsis: "x, ... → sqrt(x), ...",
  }, x => ({ n: C.sqrt(x.n), units: "" })),

  unary(CATEGORY, {
    key: "cbrt",
    summary: "cube root",
    synopsis: "x, ... → cbrt(x), ...",
  }, x => realValue(Math.cbrt(realArg(x, "cbrt")))),
];
