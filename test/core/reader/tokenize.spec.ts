// test/core/reader/tokenize.spec.ts
// Tests for the tokenizer

import { describe, it, expect } from "vitest";
import { peelOperator, split, tokenize } from "../../../src/core/reader/tokenize";
import { isCalcError } from "../../../src/outcome/error";
import type { Failure } from "../../../src/outcome/failure";

function syntaxFailure(src: string): Failure {
  try {
    tokenize(src);
  } catch (e) {
    if (isCalcError(e)) return e.failure;
    throw e;
  }
  throw new Error(`${src} tokenized without error`);
}

describe("tokenize", () => {
  it("splits on whitespace and records positions", () => {
    expect(tokenize("4  5 +")).toEqual([
      { tag: "Word", s: "4", pos: 0 },
      { tag: "Word", s: "5", pos: 3 },
      { tag: "Word", s: "+", pos: 5 },
    ]);
  });

  it("keeps quoted text whole", () => {
    expect(split('"rads/s" `x is $0` 1')).toEqual(['"rads/s"', "`x is $0`", "1"]);
  });

  it("stops at a comment", () => {
    expect(split("1 2 # add them later")).toEqual(["1", "2"]);
    expect(split("# nothing")).toEqual([]);
  });

  it("peels operators glued to an operand", () => {
    expect(split("100m-")).toEqual(["100m", "-"]);
    expect(split("2 3**")).toEqual(["2", "3", "**"]);
    expect(split("5!")).toEqual(["5", "!"]);
    expect(split("-5 chs")).toEqual(["-5", "chs"]);
  });

  it("turns (body)name into one definition token", () => {
    const [def, three] = tokenize("(2 *)dbl 3");
    expect(def.tag).toBe("Define");
    if (def.tag === "Define") {
      expect(def.name).toBe("dbl");
      expect(def.s).toBe("(2 *)dbl");
      expect(def.body).toEqual([
        { tag: "Word", s: "2", pos: 1 },
        { tag: "Word", s: "*", pos: 3 },
      ]);
    }
    expect(three).toEqual({ tag: "Word", s: "3", pos: 9 });
  });

  it("allows parentheses and quotes inside definitions", () => {
    const [outer] = tokenize('((1)one "a)b")two');
    expect(outer.tag).toBe("Define");
    if (outer.tag === "Define") {
      expect(outer.name).toBe("two");
      expect(outer.body.map(t => t.s)).toEqual(["(1)one", '"a)b"']);
    }
  });

  it("reports unterminated quotes", () => {
    const f = syntaxFailure('1 "abc');
    expect(f.kind).toBe("SyntaxError");
    expect(f.message).toBe("unterminated quote.");
    expect(f.position).toBe(2);

    expect(syntaxFailure("`abc").message).toBe("unterminated back-quote.");
  });

  it("reports parenthesis problems", () => {
    expect(syntaxFailure("1 )").message).toBe("unbalanced parentheses.");
    expect(syntaxFailure("(1 2").message).toBe("unterminated parenthesis.");
    expect(syntaxFailure("(1 2) 3").message).toBe("macro definition needs a name.");
  });
});

describe("peelOperator", () => {
  it("peels only after something operand-like", () => {
    expect(peelOperator("x-")).toEqual(["x", "-"]);
    expect(peelOperator("a||")).toEqual(["a", "||"]);
    expect(peelOperator("**")).toEqual(["**"]);
    expect(peelOperator("//")).toEqual(["//"]);
    expect(peelOperator("%chg")).toEqual(["%chg"]);
  });
});
