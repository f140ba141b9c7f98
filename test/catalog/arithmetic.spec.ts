// test/catalog/arithmetic.spec.ts
// Arithmetic operators, powers and logarithms

import { describe, it, expect } from "vitest";
import { makeCalc } from "../helpers/calc";

function rendered(line: string): string {
  return makeCalc().run(line);
}

describe("arithmetic", () => {
  it.each([
    ["7 2 +", "9"],
    ["7 2 -", "5"],
    ["7 2 *", "14"],
    ["7 2 /", "3.5"],
    ["7 2 //", "3"],
    ["-7 2 %", "1"],
    ["7 -2 %", "-1"],
    ["50 75 %chg", "50"],
    ["100 100 ||", "50"],
    ["3 chs", "-3"],
    ["4 recip", "250m"],
    ["3.7 ceil", "4"],
    ["-3.7 floor", "-4"],
    ["5 !", "120"],
    ["j 2 *", "j2"],
    ["3 j 4 * +", "3 + j4"],
  ])("%s gives %s", (line, expected) => {
    expect(rendered(line)).toBe(expected);
  });

  it("works with operators glued to their operand", () => {
    expect(rendered("1k 200-")).toBe("800");
  });

  it("reports division by zero", () => {
    const f = makeCalc().fails("1 0 /");
    expect(f.kind).toBe("DomainError");
    expect(f.message).toBe("division by zero.");
  });

  it("rejects the factorial of a negative number", () => {
    expect(makeCalc().fails("-1 !").message).toBe("math domain error.");
  });

  it("rejects complex operands where only reals make sense", () => {
    expect(makeCalc().fails("j 2 //").message).toBe("Function does not support a complex argument.");
  });

  it("draws random numbers from the injected generator", () => {
    const { run } = makeCalc();
    expect(run("rand")).toBe("250m");
    expect(run("rand")).toBe("750m");
  });
});

describe("powers and logarithms", () => {
  it.each([
    ["2 10 **", "1.024k"],
    ["2 10 pow", "1.024k"],
    ["3 sqr", "9"],
    ["16 sqrt", "4"],
    ["-4 sqrt", "j2"],
    ["27 cbrt", "3"],
    ["100 log", "2"],
    ["8 log2", "3"],
    ["1 exp", "2.7183"],
    ["3 pow10", "1k"],
    ["10 pow2", "1.024k"],
    ["-1 ln", "j3.1416"],
  ])("%s gives %s", (line, expected) => {
    expect(rendered(line)).toBe(expected);
  });

  it("rejects the logarithm of zero", () => {
    const f = makeCalc().fails("0 ln");
    expect(f.kind).toBe("DomainError");
    expect(f.message).toBe("math domain error.");
  });

  it("rejects zero raised to a negative power", () => {
    expect(makeCalc().fails("0 -1 **").message).toBe("division by zero.");
  });
});
