// src/core/values/complex.ts
// Scalar arithmetic over the Real | Complex union.
// Real inputs stay on the plain Math path; anything complex goes through (re, im).

import { complex, exactInteger, imagPart, integer, real, realPart, type Scalar } from "./value";

const re = realPart;
const im = imagPart;

export function isZero(a: Scalar): boolean {
  return re(a) === 0 && im(a) === 0;
}

// Two exact integers combine exactly under +, - and *.
function exactly(a: Scalar, b: Scalar, op: (p: bigint, q: bigint) => bigint): Scalar | undefined {
  const p = exactInteger(a);
  const q = exactInteger(b);
  return p === undefined || q === undefined ? undefined : integer(op(p, q));
}

export function add(a: Scalar, b: Scalar): Scalar {
  const exact = exactly(a, b, (p, q) => p + q);
  if (exact) return exact;
  if (a.tag === "Real" && b.tag === "Real") return real(a.x + b.x);
  return complex(re(a) + re(b), im(a) + im(b));
}

export function sub(a: Scalar, b: Scalar): Scalar {
  const exact = exactly(a, b, (p, q) => p - q);
  if (exact) return exact;
  if (a.tag === "Real" && b.tag === "Real") return real(a.x - b.x);
  return complex(re(a) - re(b), im(a) - im(b));
}

export function mul(a: Scalar, b: Scalar): Scalar {
  const exact = exactly(a, b, (p, q) => p * q);
  if (exact) return exact;
  if (a.tag === "Real" && b.tag === "Real") return real(a.x * b.x);
  return complex(re(a) * re(b) - im(a) * im(b), re(a) * im(b) + im(a) * re(b));
}

/** Caller checks for a zero divisor. */
export function div(a: Scalar, b: Scalar): Scalar {
  if (a.tag === "Real" && b.tag === "Real") return real(a.x / b.x);
  const d = re(b) * re(b) + im(b) * im(b);
  return complex(
    (re(a) * re(b) + im(a) * im(b)) / d,
    (im(a) * re(b) - re(a) * im(b)) / d
  );
}

export function neg(a: Scalar): Scalar {
  if (a.tag === "Real") return a.exact === undefined ? real(-a.x) : integer(-a.exact);
  return complex(-a.re, -a.im);
}

export function abs(a: Scalar): number {
  return a.tag === "Real" ? Math.abs(a.x) : Math.hypot(a.re, a.im);
}

export function arg(a: Scalar): number {
  return Math.atan2(im(a), re(a));
}

export function exp(a: Scalar): Scalar {
  if (a.tag === "Real") return real(Math.exp(a.x));
  const m = Math.exp(a.re);
  return complex(m * Math.cos(a.im), m * Math.sin(a.im));
}

/** Principal natural log; negative reals give a complex result. */
export function log(a: Scalar): Scalar {
  if (a.tag === "Real" && a.x >= 0) return real(Math.log(a.x));
  return complex(Math.log(abs(a)), arg(a));
}

export function sqrt(a: Scalar): Scalar {
  if (a.tag === "Real") {
    return a.x >= 0 ? real(Math.sqrt(a.x)) : complex(0, Math.sqrt(-a.x));
  }
  const r = abs(a);
  const s = Math.sqrt((r + a.re) / 2);
  const t = Math.sqrt((r - a.re) / 2);
  return complex(s, a.im < 0 ? -t : t);
}

export function pow(base: Scalar, exponent: Scalar): Scalar {
  if (base.tag === "Real" && exponent.tag === "Real") {
    if (base.x >= 0 || Number.isInteger(exponent.x)) {
      return real(Math.pow(base.x, exponent.x));
    }
  }
  if (isZero(base)) {
    return isZero(exponent) ? real(1) : real(0);
  }
  return exp(mul(exponent, log(base)));
}
