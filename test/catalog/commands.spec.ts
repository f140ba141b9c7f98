// test/catalog/commands.spec.ts
// Stack, variable, format and miscellaneous commands

import { describe, it, expect } from "vitest";
import { ABOUT_TEXT, interpolate } from "../../src/catalog";
import { makeCalc } from "../helpers/calc";

describe("stack commands", () => {
  it("prints the stack with register labels", () => {
    const { run, sink } = makeCalc();
    run("1 2 3 stack");
    expect(sink.messages).toEqual(["     1", "  y: 2", "  x: 3"]);
  });

  it("swaps, duplicates and drops", () => {
    const { run } = makeCalc();
    expect(run("1 2 swap")).toBe("1");
    expect(run("enter +")).toBe("2");
    expect(run("clrx")).toBe("2");
    expect(run("clstack")).toBe("");
  });
});

describe("variable commands", () => {
  it("stores x without consuming it", () => {
    const { calc, run } = makeCalc();
    expect(run("5 =a")).toBe("5");
    expect(calc.state.stack.depth).toBe(1);
    expect(run("a a +")).toBe("10");
  });

  it("warns when a variable takes over a built-in", () => {
    const { run, sink } = makeCalc();
    run("3 =pi");
    expect(sink.warnings).toEqual(["pi: variable has overridden built-in."]);
    expect(sink.diagnostics[0].code).toBe("W0001");
    expect(run("pi")).toBe("3");
  });

  it("lists variables sorted by name", () => {
    const { run, sink } = makeCalc();
    run("5 =a vars");
    expect(sink.messages).toEqual(["  Rref: 50 Ω", "  a: 5"]);
  });
});

describe("format commands", () => {
  it.each([
    ["1234.5 fix2", "1,234.50"],
    ["1234.56 eng3", "1.235e3"],
    ["1234.5 sci", "1.2345e+03"],
    ["255 hex", "0x00ff"],
    ["255 hex2", "0xff"],
    ["8 oct", "0o0010"],
    ["5 bin", "0b0101"],
    ["255 vhex2", "'hff"],
    ["12 vdec", "'d0012"],
    ["8 voct2", "'o10"],
  ])("%s renders as %s", (line, expected) => {
    expect(makeCalc().run(line)).toBe(expected);
  });

  it("keeps the digits when only the notation changes", () => {
    const { calc, run } = makeCalc();
    run("fix2 hex");
    expect(calc.state.formatter.current).toEqual({ notation: "hex", digits: 2 });
    expect(run("si 1500")).toBe("1.5k");
  });
});

describe("miscellaneous commands", () => {
  it("attaches units to x", () => {
    expect(makeCalc().run("5 \"V\"")).toBe("5 V");
  });

  it("converts between units", () => {
    expect(makeCalc().run("100 \"C\" >F")).toBe("212 F");
  });

  it("refuses to convert a value without units", () => {
    const f = makeCalc().fails("3 >m");
    expect(f.kind).toBe("UnitMismatch");
    expect(f.message).toBe("cannot convert unitless value to \"m\".");
  });

  it("prints text with register and variable references", () => {
    const { run, sink } = makeCalc();
    run("1 2 `x=$0 y=${1} cost $$5 into $Rref`");
    expect(sink.messages).toEqual(["x=2 y=1 cost $5 into 50 Ω"]);
  });

  it("marks unknown references", () => {
    const { run, sink } = makeCalc();
    run("`$nope`");
    expect(sink.messages).toEqual(["$?nope?"]);
    expect(sink.warnings).toEqual(["$nope: unknown."]);
  });

  it("prints x for empty text", () => {
    const { run, sink } = makeCalc();
    run("``");
    run("7 ``");
    expect(sink.messages).toEqual(["", "7"]);
  });

  it("expands escapes", () => {
    const { calc } = makeCalc();
    expect(interpolate("a\\tb\\nc", calc.state)).toBe("a\tb\nc");
  });

  it("lists user-defined functions by name", () => {
    const { run, sink } = makeCalc();
    run("(1 +)inc (2 *)double");
    run("functions");
    expect(sink.messages).toEqual(["  (2 *)double", "  (1 +)inc"]);
  });

  it("lists nothing before any function is defined", () => {
    const { run, sink } = makeCalc();
    run("functions");
    expect(sink.messages).toEqual([]);
  });

  it("prints the about text", () => {
    const { run, sink } = makeCalc();
    run("about");
    expect(sink.messages).toEqual([ABOUT_TEXT]);
  });

  it("describes a topic", () => {
    const { run, sink } = makeCalc();
    run("?sin");
    expect(sink.messages).toEqual(["sin: trigonometric sine", "", "stack: x, ... → sin(x), ..."]);
  });

  it("describes a user-defined function", () => {
    const { run, sink } = makeCalc();
    run("(2 *)double ?double");
    expect(sink.messages).toEqual(["double: user-defined function", "", "definition: (2 *)double"]);
  });

  it("warns about a topic it does not know", () => {
    const { run, sink } = makeCalc();
    run("?qqqq");
    expect(sink.warnings).toEqual(["qqqq: not found."]);
    expect(sink.messages).toEqual([]);
  });

  it("lists topics", () => {
    const { run, sink } = makeCalc();
    run("?");
    expect(sink.messages.slice(0, 4)).toEqual([
      "For summary of all topics, use 'help'.",
      "For help on a particular topic, use '?topic'.",
      "",
      "Available topics:",
    ]);
  });

  it("prints a summary grouped by category", () => {
    const { run, sink } = makeCalc();
    run("help");
    const summary = sink.messages[0].split("\n");
    expect(summary[0]).toBe("Arithmetic Operators");
    expect(summary[1]).toBe("    +: addition");
  });

  it("quits with :q", () => {
    const { calc, run } = makeCalc();
    run(":q");
    expect(calc.exitRequested).toBe(true);
  });
});
