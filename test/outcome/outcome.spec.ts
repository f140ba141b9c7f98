import { describe, it, expect } from "vitest";
import { attempt, isDone, isFail, mapOutcome, match, unwrap, unwrapOr, type Outcome } from "../../src/outcome/outcome";
import { failure, isFailureKind, locate, wrapFailure } from "../../src/outcome/failure";
import { DIAGNOSTIC_CODES, errorDiag, makeDiagnostic, warnDiag } from "../../src/outcome/codes";
import { CalcError, isCalcError } from "../../src/outcome/error";
import {
  divisionByZero,
  done,
  fail,
  insufficientOperands,
  macroRecursionLimit,
  missingConstant,
  numberFormatError,
  syntaxError,
  unitMismatch,
  unknownToken,
  unterminated,
} from "../../src/outcome/constructors";

describe("Outcome ADT", () => {
  it("done and fail are told apart by their tag", () => {
    const ok = done(42);
    const bad = fail(unknownToken("zork"));

    expect(isDone(ok)).toBe(true);
    expect(isFail(ok)).toBe(false);
    expect(isFail(bad)).toBe(true);
    expect(isDone(bad)).toBe(false);
  });

  it("match dispatches on the tag", () => {
    const render = (o: Outcome<number>) =>
      match(o, {
        done: n => `value ${n}`,
        fail: f => `error ${f.kind}`,
      });

    expect(render(done(3))).toBe("value 3");
    expect(render(fail(divisionByZero()))).toBe("error DomainError");
  });

  it("mapOutcome maps values and passes failures through", () => {
    expect(mapOutcome(done(2), n => n * 10)).toEqual({ tag: "Done", value: 20 });

    const bad = fail(divisionByZero());
    expect(mapOutcome(bad, (n: number) => n * 10)).toBe(bad);
  });

  it("unwrap rethrows a failure as CalcError", () => {
    expect(unwrap(done("x"))).toBe("x");

    let caught: unknown;
    try {
      unwrap(fail(unknownToken("zork")));
    } catch (e) {
      caught = e;
    }
    expect(isCalcError(caught)).toBe(true);
    if (isCalcError(caught)) {
      expect(caught.failure.kind).toBe("UnknownToken");
      expect(caught.message).toBe("zork: unrecognized.");
    }
  });

  it("unwrapOr falls back on failure", () => {
    expect(unwrapOr(done(1), 0)).toBe(1);
    expect(unwrapOr(fail(divisionByZero()), 0)).toBe(0);
  });

  it("attempt turns a thrown CalcError into a failure", () => {
    expect(attempt(() => 5)).toEqual({ tag: "Done", value: 5 });
    const caught = attempt((): number => {
      throw new CalcError(divisionByZero());
    });
    expect(isFail(caught) && caught.failure.message).toBe("division by zero.");
  });

  it("attempt lets other errors through", () => {
    expect(() => attempt(() => {
      throw new TypeError("bug");
    })).toThrow("bug");
  });
});

describe("Failures", () => {
  it("failure fills in defaults", () => {
    const f = failure("DomainError", "math domain error.");
    expect(f.kind).toBe("DomainError");
    expect(f.diagnostics).toEqual([]);
    expect(f.token).toBeUndefined();
  });

  it("locate attaches token and position once", () => {
    const f = locate(unknownToken("zork"), "zork", 4);
    expect(f.token).toBe("zork");
    expect(f.position).toBe(4);

    const again = locate(f, "outer", 0);
    expect(again.token).toBe("zork");
    expect(again.position).toBe(4);
  });

  it("wrapFailure keeps the kind and records the cause", () => {
    const inner = divisionByZero();
    const outer = wrapFailure(inner, "script.ec:3: division by zero.", { line: 3 });

    expect(outer.kind).toBe("DomainError");
    expect(outer.message).toBe("script.ec:3: division by zero.");
    expect(outer.context).toEqual({ line: 3 });
    expect(outer.cause).toBe(inner);
  });

  it("isFailureKind compares kinds", () => {
    expect(isFailureKind(unitMismatch("m", "s"), "UnitMismatch")).toBe(true);
    expect(isFailureKind(unitMismatch("m", "s"), "DomainError")).toBe(false);
  });
});

describe("Named constructors", () => {
  it("syntaxError uses the generic code unless given one", () => {
    const f = syntaxError("bad input.", 2);
    expect(f.kind).toBe("SyntaxError");
    expect(f.position).toBe(2);
    expect(f.diagnostics[0].code).toBe("E0004");
    expect(f.diagnostics[0].message).toBe("bad input.");
  });

  it("unterminated carries its own code", () => {
    const f = unterminated("quote", 5);
    expect(f.message).toBe("unterminated quote.");
    expect(f.diagnostics[0].code).toBe("E0001");
    expect(f.diagnostics[0].message).toBe("Unterminated quote");
    expect(f.diagnostics[0].position).toBe(5);
  });

  it("insufficientOperands pluralizes", () => {
    expect(insufficientOperands("+", 2, 1).message).toBe("+: needs 2 values on the stack.");
    expect(insufficientOperands("chs", 1, 0).message).toBe("chs: needs 1 value on the stack.");
  });

  it("messages follow the calculator's wording", () => {
    expect(numberFormatError("0x", "hexadecimal").message).toBe("0x: invalid hexadecimal number.");
    expect(divisionByZero().message).toBe("division by zero.");
    expect(missingConstant("Z0", "cgs").message).toBe("Z0: not available in cgs units.");
    expect(unitMismatch("", "m").message).toBe('cannot convert unitless value to "m".');
    expect(unitMismatch("s", "m").message).toBe('cannot convert "s" to "m".');
    expect(macroRecursionLimit("loop", 100).kind).toBe("MacroRecursionLimit");
  });

  it("CalcError carries the failure", () => {
    const e = new CalcError(divisionByZero());
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe("CalcError");
    expect(e.failure.kind).toBe("DomainError");
  });
});

describe("Diagnostics", () => {
  it("makeDiagnostic fills the template", () => {
    const d = makeDiagnostic("E0200", { need: 2, have: 0 });
    expect(d).toEqual({
      code: "E0200",
      severity: "error",
      message: "Insufficient operands: need 2, have 0",
      position: undefined,
      data: { need: 2, have: 0 },
    });
  });

  it("warnings come from W codes", () => {
    expect(makeDiagnostic("W0001", { name: "pi" }).severity).toBe("warning");
    expect(DIAGNOSTIC_CODES.W0003.template).toBe("No help for {topic}");
  });

  it("errorDiag and warnDiag set severity", () => {
    expect(errorDiag("E9", "boom").severity).toBe("error");
    expect(warnDiag("W9", "hmm", { position: 1 })).toEqual({
      code: "W9",
      message: "hmm",
      severity: "warning",
      position: 1,
    });
  });
});
