// src/catalog/hyperbolic.ts

import type { KeyedAction } from "../registry/types";
import { domainUnless, realArg, realValue, unary } from "./helpers";

const CATEGORY = "Hyperbolic Functions";

function hyperbolic(
  key: string,
  fn: (x: number) => number,
  summary: string,
  inDomain: (x: number) => boolean = () => true
): KeyedAction {
  return unary(CATEGORY, { key, summary, synopsis: `x, ... → ${key}(x), ...` }, x => {
    const arg = realArg(x, key);
    domainUnless(inDomain(arg), key);
    return realValue(fn(arg));
  });
}

export const hyperbolicActions: KeyedAction[] = [
  hyperbolic("sinh", Math.sinh, "hyperbolic sine"),
  hyperbolic("cosh", Math.cosh, "hyperbolic cosine"),
  hyperbolic("tanh", Math.tanh, "hyperbolic tangent"),
  hyperbolic("asinh", Math.asinh, "hyperbolic arc sine"),
  hyperbolic("acosh", Math.acosh, "hyperbolic arc cosine", x => x >= 1),
  hyperbolic("atanh", Math.atanh, "hyperbolic arc tangent", x => Math.abs(x) < 1),
];
