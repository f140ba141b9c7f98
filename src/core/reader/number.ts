// src/core/reader/number.ts
// Number literals: C and Verilog prefixed integers, scientific notation,
// SI scale letters, currency prefixes and a leading j for imaginary values.

import { done, fail, numberFormatError } from "../../outcome/constructors";
import type { Outcome } from "../../outcome/outcome";
import { complex, integer, real, type Scalar, type Value } from "../values/value";

export const SCALE_FACTORS: Readonly<Record<string, number>> = {
  Y: 1e24, Z: 1e21, E: 1e18, P: 1e15, T: 1e12, G: 1e9, M: 1e6, K: 1e3, k: 1e3,
  _: 1,
  m: 1e-3, u: 1e-6, "µ": 1e-6, "μ": 1e-6, n: 1e-9, p: 1e-12, f: 1e-15, a: 1e-18, z: 1e-21, y: 1e-24,
};

export const CURRENCY_PREFIXES = "$€¥£₩₺₽₹Ƀ₿șΞ";

const CUR = `[${CURRENCY_PREFIXES.replace("$", "\\$")}]`;
const LOOKS_NUMERIC = new RegExp(`^[-+]?(?:${CUR})?j?(?:\\.?\\d|'[hodbHODB])`, "u");
const C_INTEGER = /^([-+]?)0([xXoObB])(.*)$/u;
const VERILOG_INTEGER = /^([-+]?)'([hHoObBdD])(.*)$/u;
const DECIMAL = new RegExp(`^([-+]?)(${CUR})?(j?)(\\d[\\d,]*(?:\\.\\d*)?|\\.\\d+)(.*)$`, "u");
const SCI_TAIL = /^([eE][-+]?\d+)([\p{L}_]*)$/u;
const UNITS = /^[\p{L}_]*$/u;

const DIGITS: Record<string, { radix: number; valid: RegExp; name: string }> = {
  x: { radix: 16, valid: /^[0-9a-f_]*[0-9a-f][0-9a-f_]*$/i, name: "hexadecimal" },
  h: { radix: 16, valid: /^[0-9a-f_]*[0-9a-f][0-9a-f_]*$/i, name: "hexadecimal" },
  o: { radix: 8, valid: /^[0-7_]*[0-7][0-7_]*$/, name: "octal" },
  b: { radix: 2, valid: /^[01_]*[01][01_]*$/, name: "binary" },
  d: { radix: 10, valid: /^[0-9_]*[0-9][0-9_]*$/, name: "decimal" },
};

/** True when the token starts the way a number literal does. */
export function looksNumeric(token: string): boolean {
  return LOOKS_NUMERIC.test(token);
}

/**
 * Reads a number literal.
 * Returns undefined when the token is not shaped like a number at all,
 * so the dispatcher can move on; a failure when it is but does not parse.
 */
export function parseNumber(token: string): Outcome<Value> | undefined {
  if (!looksNumeric(token)) return undefined;

  const prefixed = C_INTEGER.exec(token) ?? VERILOG_INTEGER.exec(token);
  if (prefixed) return parseInteger(token, prefixed[1], prefixed[2].toLowerCase(), prefixed[3]);

  const m = DECIMAL.exec(token);
  if (!m) return fail(numberFormatError(token, "decimal"));
  const [, sign, currency, imaginary, rawMantissa, tail] = m;
  const mantissa = rawMantissa.replace(/,/g, "");

  let magnitude: number;
  let units: string;
  const sci = SCI_TAIL.exec(tail);
  if (tail === "") {
    magnitude = Number(mantissa);
    units = "";
  } else if (sci) {
    magnitude = Number(mantissa + sci[1]);
    units = sci[2];
  } else {
    const scale = SCALE_FACTORS[tail[0]];
    const rest = tail.slice(1);
    if (scale === undefined || !UNITS.test(rest)) return fail(numberFormatError(token, "decimal"));
    magnitude = Number(mantissa) * scale;
    units = rest;
  }

  if (Number.isNaN(magnitude)) return fail(numberFormatError(token, "decimal"));
  if (currency !== undefined) {
    if (units) return fail(numberFormatError(token, "decimal"));
    units = currency;
  }

  const signed = sign === "-" ? -magnitude : magnitude;
  const n: Scalar = imaginary ? complex(0, signed) : real(signed);
  return done({ n, units });
}

function parseInteger(token: string, sign: string, base: string, digits: string): Outcome<Value> {
  const spec = DIGITS[base];
  if (!spec.valid.test(digits)) return fail(numberFormatError(token, spec.name));
  const radix = BigInt(spec.radix);
  let magnitude = 0n;
  for (const ch of digits.replace(/_/g, "")) magnitude = magnitude * radix + BigInt(parseInt(ch, spec.radix));
  return done({ n: integer(sign === "-" ? -magnitude : magnitude), units: "" });
}
