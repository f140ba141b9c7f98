// test/script/runner.spec.ts
// Running multi-line scripts under the fatal and interactive policies

import { describe, it, expect } from "vitest";
import { failure } from "../../src/outcome/failure";
import { BufferSink } from "../../src/ports/sink";
import { describeFailure, runScript, type LineTrace } from "../../src/script/runner";
import { expectDone, expectFail, makeCalc } from "../helpers/calc";

describe("runScript", () => {
  it("evaluates every line and returns the final display", () => {
    const { calc } = makeCalc();
    expect(expectDone(runScript(calc, "1 2\n+\n"))).toBe("3");
  });

  it("accepts CRLF line endings", () => {
    const { calc } = makeCalc();
    expect(expectDone(runScript(calc, "(1 +)inc\r\n5 inc\r\n"))).toBe("6");
  });

  it("stops at the first failed line under the fatal policy", () => {
    const { calc } = makeCalc();
    const f = expectFail(runScript(calc, "1\n@@\n2", { source: "calc.ec" }));
    expect(f.message).toBe("calc.ec:2: @@: unrecognized.");
    expect(f.kind).toBe("UnknownToken");
    expect(f.context).toEqual({ source: "calc.ec", line: 2 });
    expect(f.cause?.message).toBe("@@: unrecognized.");
    expect(calc.display()).toBe("1");
  });

  it("reports and continues under the interactive policy", () => {
    const { calc } = makeCalc();
    const sink = new BufferSink();
    const result = runScript(calc, "1\n3 @@\n2", { source: "calc.ec", policy: "interactive", sink });
    expect(expectDone(result)).toBe("2");
    expect(sink.errors).toEqual(["calc.ec:2: @@: unrecognized.\n    3 @@\n      ^"]);
    expect(calc.state.stack.depth).toBe(2);
  });

  it("names the source <script> by default", () => {
    const { calc } = makeCalc();
    expect(expectFail(runScript(calc, "+")).message).toBe("<script>:1: +: needs 2 values on the stack.");
  });

  it("stops after quit", () => {
    const { calc } = makeCalc();
    expect(expectDone(runScript(calc, "1\nquit\n2"))).toBe("1");
  });

  it("traces each line", () => {
    const { calc } = makeCalc();
    const traces: LineTrace[] = [];
    runScript(calc, "4 5 +\n@@", { source: "t.ec", policy: "interactive", onLine: t => traces.push(t) });
    expect(traces).toEqual([
      { source: "t.ec", line: 1, text: "4 5 +", display: "9" },
      { source: "t.ec", line: 2, text: "@@", display: undefined },
    ]);
  });
});

describe("describeFailure", () => {
  it("points at the offending token", () => {
    const f = failure("UnknownToken", "zz: unrecognized.", { position: 4 });
    expect(describeFailure(f, "1 2 zz")).toBe("zz: unrecognized.\n    1 2 zz\n        ^");
  });

  it("falls back to the message without a position or line", () => {
    const f = failure("DomainError", "division by zero.");
    expect(describeFailure(f, "1 0 /")).toBe("division by zero.");
    expect(describeFailure(failure("DomainError", "x", { position: 1 }))).toBe("x");
  });
});
