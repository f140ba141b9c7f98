// src/core/values/value.ts
// Calculator values: a real or complex scalar annotated with opaque unit text

/**
 * Prefixed integer literals keep their exact value in `exact` next to the
 * float in `x`. Integer notations render from `exact` when it is present.
 */
export type Scalar =
  | { tag: "Real"; x: number; exact?: bigint }
  | { tag: "Complex"; re: number; im: number };

export type Notation =
  | "si"
  | "eng"
  | "sci"
  | "fixed"
  | "hex"
  | "oct"
  | "bin"
  | "v-hex"
  | "v-oct"
  | "v-bin"
  | "v-dec";

export const NOTATIONS: readonly Notation[] = [
  "si", "eng", "sci", "fixed", "hex", "oct", "bin", "v-hex", "v-oct", "v-bin", "v-dec",
];

export function isNotation(s: string): s is Notation {
  return NOTATIONS.some(n => n === s);
}

export interface Value {
  readonly n: Scalar;
  /** Free text; only unit conversion ever looks inside it */
  readonly units: string;
}

export function real(x: number): Scalar {
  return { tag: "Real", x };
}

export function integer(i: bigint): Scalar {
  return { tag: "Real", x: Number(i), exact: i };
}

/** The exact integer held by s, if it has one. */
export function exactInteger(s: Scalar): bigint | undefined {
  return s.tag === "Real" ? s.exact : undefined;
}

/** Collapses to a real scalar when the imaginary part is exactly zero. */
export function complex(re: number, im: number): Scalar {
  return im === 0 ? real(re) : { tag: "Complex", re, im };
}

export function value(n: Scalar | number, units = ""): Value {
  return { n: typeof n === "number" ? real(n) : n, units };
}

export function withUnits(v: Value, units: string): Value {
  return { ...v, units };
}

export function realPart(s: Scalar): number {
  return s.tag === "Real" ? s.x : s.re;
}

export function imagPart(s: Scalar): number {
  return s.tag === "Real" ? 0 : s.im;
}
