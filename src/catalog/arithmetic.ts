// src/catalog/arithmetic.ts
// Arithmetic operators. Binary operators compute y ∘ x.

import { CalcError } from "../outcome/error";
import { divisionByZero, mathDomainError } from "../outcome/constructors";
import * as C from "../core/values/complex";
import { exactInteger, integer, real, value, type Value } from "../core/values/value";
import type { KeyedAction } from "../registry/types";
import { binary, commonUnits, nullary, realArg, realValue, unary } from "./helpers";

const CATEGORY = "Arithmetic Operators";

function nonZero(v: Value): void {
  if (C.isZero(v.n)) throw new CalcError(divisionByZero());
}

function factorial(n: number): number {
  let result = 1;
  for (let i = 2; i <= n && Number.isFinite(result); i++) result *= i;
  return result;
}

function exactPair(n: Value, d: Value): [bigint, bigint] | undefined {
  const p = exactInteger(n.n);
  const q = exactInteger(d.n);
  return p === undefined || q === undefined ? undefined : [p, q];
}

function floorDiv(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && (n < 0n) !== (d < 0n) ? q - 1n : q;
}

export const arithmeticActions: KeyedAction[] = [
  binary(CATEGORY, {
    key: "+",
    summary: "addition",
    synopsis: "x, y, ... → x+y, ...",
    detail: "The values in x and y are added. Units are kept only if both agree.",
  }, (x, y) => ({ n: C.add(y.n, x.n), units: commonUnits(x, y) })),

  binary(CATEGORY, {
    key: "-",
    summary: "subtraction",
    synopsis: "x, y, ... → y-x, ...",
    detail: "x is subtracted from y. Units are kept only if both agree.",
  }, (x, y) => ({ n: C.sub(y.n, x.n), units: commonUnits(x, y) })),

  binary(CATEGORY, {
    key: "*",
    summary: "multiplication",
    synopsis: "x, y, ... → y*x, ...",
  }, (x, y) => ({ n: C.mul(y.n, x.n), units: "" })),

  binary(CATEGORY, {
    key: "/",
    summary: "true division",
    synopsis: "x, y, ... → y/x, ...",
  }, (x, y) => {
    nonZero(x);
    return { n: C.div(y.n, x.n), units: "" };
  }),

  binary(CATEGORY, {
    key: "//",
    summary: "floor division",
    synopsis: "x, y, ... → y//x, ...",
    detail: "y is divided by x and the result rounded down to the nearest integer.",
  }, (x, y) => {
    const d = realArg(x, "//");
    const n = realArg(y, "//");
    nonZero(x);
    const exact = exactPair(y, x);
    if (exact) return value(integer(floorDiv(exact[0], exact[1])));
    return realValue(Math.floor(n / d));
  }),

  binary(CATEGORY, {
    key: "%",
    summary: "modulus",
    synopsis: "x, y, ... → y%x, ...",
    detail: "The remainder of y divided by x. It takes the sign of x.",
  }, (x, y) => {
    const d = realArg(x, "%");
    const n = realArg(y, "%");
    nonZero(x);
    const exact = exactPair(y, x);
    if (exact) return value(integer(((exact[0] % exact[1]) + exact[1]) % exact[1]));
    return realValue(((n % d) + d) % d);
  }),

  binary(CATEGORY, {
    key: "%chg",
    summary: "percent change",
    synopsis: "x, y, ... → 100*(x-y)/y, ...",
    detail: "The change from y to x, as a percentage of y.",
  }, (x, y) => {
    nonZero(y);
    return { n: C.mul(real(100), C.div(C.sub(x.n, y.n), y.n)), units: "" };
  }),

  binary(CATEGORY, {
    key: "||",
    summary: "parallel combination",
    synopsis: "x, y, ... → 1/(1/x+1/y), ...",
    detail: "The parallel combination of two impedances. Units are kept only if both agree.",
  }, (x, y) => {
    const sum = C.add(x.n, y.n);
    if (C.isZero(sum)) throw new CalcError(divisionByZero());
    return { n: C.mul(C.div(x.n, sum), y.n), units: commonUnits(x, y) };
  }),

  unary(CATEGORY, {
    key: "chs",
    summary: "change sign",
    synopsis: "x, ... → −x, ...",
  }, x => ({ n: C.neg(x.n), units: x.units })),

  unary(CATEGORY, {
    key: "recip",
    summary: "reciprocal",
    synopsis: "x, ... → 1/x, ...",
  }, x => {
    nonZero(x);
    return { n: C.div(real(1), x.n), units: "" };
  }),

  unary(CATEGORY, {
    key: "ceil",
    summary: "round towards positive infinity",
    synopsis: "x, ... → ceil(x), ...",
  }, x => realValue(Math.ceil(realArg(x, "ceil")), x.units)),

  unary(CATEGORY, {
    key: "floor",
    summary: "round towards negative infinity",
    synopsis: "x, ... → floor(x), ...",
  }, x => realValue(Math.floor(realArg(x, "floor")), x.units)),

  unary(CATEGORY, {
    key: "!",
    name: "factorial",
    summary: "factorial",
    synopsis: "x, ... → x!, ...",
    detail: "x is rounded to the nearest integer and replaced by its factorial.",
  }, x => {
    const n = Math.round(realArg(x, "!"));
    if (n < 0) throw new CalcError(mathDomainError("!"));
    return realValue(factorial(n));
  }),

  nullary(CATEGORY, {
    key: "rand",
    summary: "random number between 0 and 1",
    synopsis: "... → rand, ...",
  }, state => realValue(state.rng.nextFloat())),
];

