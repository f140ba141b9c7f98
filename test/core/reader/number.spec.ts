// test/core/reader/number.spec.ts
// Tests for number literals

import { describe, it, expect } from "vitest";
import { looksNumeric, parseNumber } from "../../../src/core/reader/number";
import { exactInteger, imagPart, realPart, type Value } from "../../../src/core/values/value";
import type { Failure } from "../../../src/outcome/failure";

function parsed(token: string): Value {
  const o = parseNumber(token);
  if (o === undefined) throw new Error(`${token} was not recognized as a number`);
  if (o.tag === "Fail") throw new Error(o.failure.message);
  return o.value;
}

function rejected(token: string): Failure {
  const o = parseNumber(token);
  if (o === undefined || o.tag === "Done") throw new Error(`${token} should not parse`);
  return o.failure;
}

describe("looksNumeric", () => {
  it("accepts digits, signs, currency and Verilog prefixes", () => {
    for (const t of ["4", "-4", "+.5", "$5", "-€2", "j3", "'hff", "0x1f"]) {
      expect(looksNumeric(t)).toBe(true);
    }
  });

  it("rejects names and operators", () => {
    for (const t of ["pi", "-", "+", "**", "=x", "jazz", "$"]) {
      expect(looksNumeric(t)).toBe(false);
    }
  });
});

describe("parseNumber", () => {
  it("returns undefined for tokens that are not numbers at all", () => {
    expect(parseNumber("swap")).toBeUndefined();
    expect(parseNumber("-")).toBeUndefined();
  });

  it("reads plain decimals", () => {
    expect(parsed("42")).toEqual({ n: { tag: "Real", x: 42 }, units: "" });
    expect(realPart(parsed("-5").n)).toBe(-5);
    expect(realPart(parsed(".5").n)).toBe(0.5);
    expect(realPart(parsed("1,000").n)).toBe(1000);
  });

  it("reads exponents with trailing units", () => {
    expect(realPart(parsed("1e3").n)).toBe(1000);
    const v = parsed("2.5e-3s");
    expect(realPart(v.n)).toBeCloseTo(0.0025, 15);
    expect(v.units).toBe("s");
  });

  it("applies scale factors and keeps the units", () => {
    const f = parsed("1.4GHz");
    expect(realPart(f.n)).toBeCloseTo(1.4e9, 3);
    expect(f.units).toBe("Hz");

    const v = parsed("100mV");
    expect(realPart(v.n)).toBeCloseTo(0.1, 15);
    expect(v.units).toBe("V");

    expect(realPart(parsed("3k").n)).toBe(3000);
    expect(realPart(parsed("5_").n)).toBe(5);
  });

  it("reads currency prefixes as units", () => {
    const v = parsed("$20M");
    expect(realPart(v.n)).toBe(20e6);
    expect(v.units).toBe("$");

    const sats = parsed("Ƀ1");
    expect(sats.units).toBe("Ƀ");
  });

  it("rejects a currency prefix combined with units", () => {
    expect(rejected("$5kV").kind).toBe("NumberFormatError");
  });

  it("reads imaginary literals", () => {
    const v = parsed("j2");
    expect(realPart(v.n)).toBe(0);
    expect(imagPart(v.n)).toBe(2);
    expect(imagPart(parsed("-j1k").n)).toBe(-1000);
  });

  it("reads C-style integers", () => {
    expect(realPart(parsed("0xFF").n)).toBe(255);
    expect(realPart(parsed("0o17").n)).toBe(15);
    expect(realPart(parsed("-0b101").n)).toBe(-5);
    expect(realPart(parsed("0xdead_beef").n)).toBe(0xdeadbeef);
  });

  it("reads Verilog integers", () => {
    expect(realPart(parsed("'hFF").n)).toBe(255);
    expect(realPart(parsed("'b1010").n)).toBe(10);
    expect(realPart(parsed("'d1_000").n)).toBe(1000);
    expect(realPart(parsed("'o777").n)).toBe(511);
  });

  it("keeps prefixed integers exact beyond double precision", () => {
    expect(exactInteger(parsed("0x20000000000001").n)).toBe(2n ** 53n + 1n);
    expect(exactInteger(parsed("'hFFFF_FFFF_FFFF_FFFF").n)).toBe(2n ** 64n - 1n);
    expect(exactInteger(parsed("-'d9007199254740993").n)).toBe(-9007199254740993n);
    expect(exactInteger(parsed("1.5k").n)).toBeUndefined();
  });

  it("reports bad digits with the radix name", () => {
    const hex = rejected("0x");
    expect(hex.kind).toBe("NumberFormatError");
    expect(hex.message).toBe("0x: invalid hexadecimal number.");

    expect(rejected("0b102").message).toBe("0b102: invalid binary number.");
    expect(rejected("'o8").message).toBe("'o8: invalid octal number.");
  });

  it("reports an unknown scale letter", () => {
    expect(rejected("12q").message).toBe("12q: invalid decimal number.");
    expect(rejected("1.5.2").message).toBe("1.5.2: invalid decimal number.");
  });
});
