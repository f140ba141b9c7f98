// test/core/format/formatter.spec.ts
// Tests for the display formatter

import { describe, it, expect } from "vitest";
import { Formatter, engineering } from "../../../src/core/format/formatter";
import { complex, value } from "../../../src/core/values/value";

describe("engineering", () => {
  it("moves the exponent to a multiple of three", () => {
    expect(engineering(31415.9, 4)).toEqual({ mantissa: "31.416", exp: 3 });
    expect(engineering(0.125, 4)).toEqual({ mantissa: "125", exp: -3 });
    expect(engineering(9, 4)).toEqual({ mantissa: "9", exp: 0 });
  });
});

describe("Formatter", () => {
  describe("si", () => {
    const f = new Formatter();

    it("uses scale letters", () => {
      expect(f.render(value(9))).toBe("9");
      expect(f.render(value(50))).toBe("50");
      expect(f.render(value(31415.9))).toBe("31.416k");
      expect(f.render(value(0.125, "V"))).toBe("125 mV");
      expect(f.render(value(2.5e9, "Hz"))).toBe("2.5 GHz");
    });

    it("falls back to an exponent beyond the scale letters", () => {
      expect(f.render(value(1e-20))).toBe("10e-21");
      expect(f.render(value(6.62607e-34, "J-s"))).toBe("662.61e-36 J-s");
    });

    it("puts currency before the number and after the sign", () => {
      expect(f.render(value(20e6, "$"))).toBe("$20M");
      expect(f.render(value(-20e6, "$"))).toBe("-$20M");
    });

    it("renders non-finite values", () => {
      expect(f.render(value(Infinity))).toBe("inf");
      expect(f.render(value(-Infinity))).toBe("-inf");
      expect(f.render(value(NaN))).toBe("nan");
    });

    it("renders negative zero as zero", () => {
      expect(f.render(value(-0))).toBe("0");
    });
  });

  describe("complex values", () => {
    const f = new Formatter();

    it("joins real and imaginary parts", () => {
      expect(f.render(value(complex(1, 1), "V"))).toBe("1 V + j V");
      expect(f.render(value(complex(3, -4)))).toBe("3 - j4");
      expect(f.render(value(complex(0, 2)))).toBe("j2");
      expect(f.render(value(complex(0, -2)))).toBe("-j2");
    });

    it("drops an imaginary part that displays as zero", () => {
      const fixed = new Formatter({ notation: "fixed", digits: 2 });
      expect(fixed.render(value(complex(5, 0.001)))).toBe("5.00");
    });
  });

  describe("other notations", () => {
    it("eng keeps an exponent instead of a letter", () => {
      const f = new Formatter({ notation: "eng", digits: 4 });
      expect(f.render(value(1234.5))).toBe("1.2345e3");
      expect(f.render(value(12))).toBe("12");
    });

    it("sci pads the exponent", () => {
      const f = new Formatter({ notation: "sci", digits: 2 });
      expect(f.render(value(1234.5))).toBe("1.23e+03");
    });

    it("fixed groups thousands", () => {
      const f = new Formatter({ notation: "fixed", digits: 2 });
      expect(f.render(value(1234567.891, "m"))).toBe("1,234,567.89 m");
    });

    it("integer notations round, pad and drop units", () => {
      const f = new Formatter({ notation: "hex", digits: 4 });
      expect(f.render(value(255, "V"))).toBe("0x00ff");
      expect(f.render(value(-255))).toBe("-0x0ff");

      f.setNotation("v-bin");
      expect(f.render(value(255))).toBe("'b11111111");
      f.setNotation("v-dec", 0);
      expect(f.render(value(-12.4))).toBe("'d-12");
      f.setNotation("oct", 2);
      expect(f.render(value(8))).toBe("0o10");
    });

    it("setNotation keeps digits when none are given", () => {
      const f = new Formatter({ notation: "si", digits: 6 });
      f.setNotation("eng");
      expect(f.current).toEqual({ notation: "eng", digits: 6 });
    });
  });

  it("uses the configured spacer", () => {
    const f = new Formatter(undefined, "_");
    expect(f.render(value(0.125, "V"))).toBe("125_mV");
  });
});
