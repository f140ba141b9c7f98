// src/core/reader/tokenize.ts
// Splits an input line into tokens.
//
// Whitespace separates tokens, except that quoted text ("units", `print`)
// stays whole and "(body)name" becomes a single macro definition token.
// A '#' at the start of a token ends the line.

import { CalcError } from "../../outcome/error";
import { unbalancedParens, unnamedMacro, unterminated } from "../../outcome/constructors";

export type Tok =
  | { tag: "Word"; s: string; pos: number }
  | { tag: "Define"; name: string; body: Tok[]; s: string; pos: number };

/** Operators that may be written glued to the end of the previous operand, longest first. */
export const GLUED_OPERATORS: readonly string[] = ["**", "||", "//", "-", "+", "*", "/", "%", "!"];

const MACRO_NAME = /^[A-Za-z_]\w*/;
const OPERAND_END = /[\p{L}\p{N}_]$/u;

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
const isDelimiter = (c: string) => c === "\"" || c === "`" || c === "(" || c === ")";

/**
 * Tokenize a line. Positions are offsets into the line as given.
 * @throws CalcError (SyntaxError) on unterminated quotes or unbalanced parentheses
 */
export function tokenize(src: string, offset = 0): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src[i];

    if (isWS(c)) { i++; continue; }

    // comment
    if (c === "#") break;

    if (c === "\"" || c === "`") {
      const end = closingQuote(src, i, offset);
      toks.push({ tag: "Word", s: src.slice(i, end + 1), pos: offset + i });
      i = end + 1;
      continue;
    }

    if (c === "(") {
      const close = matchingParen(src, i, offset);
      const name = MACRO_NAME.exec(src.slice(close + 1));
      if (!name) throw new CalcError(unnamedMacro(offset + i));
      const body = tokenize(src.slice(i + 1, close), offset + i + 1);
      const end = close + 1 + name[0].length;
      toks.push({ tag: "Define", name: name[0], body, s: src.slice(i, end), pos: offset + i });
      i = end;
      continue;
    }

    if (c === ")") throw new CalcError(unbalancedParens(offset + i));

    const start = i;
    while (i < src.length && !isWS(src[i]) && !isDelimiter(src[i])) i++;
    const word = src.slice(start, i);
    const [head, op] = peelOperator(word);
    toks.push({ tag: "Word", s: head, pos: offset + start });
    if (op) toks.push({ tag: "Word", s: op, pos: offset + start + head.length });
  }

  return toks;
}

/** The raw token strings of a line, macro definitions included verbatim. */
export function split(src: string): string[] {
  return tokenize(src).map(t => t.s);
}

/**
 * Splits "100m-" into ["100m", "-"]. The operator only comes off when
 * what precedes it ends like an operand, so "-" and "**" stay whole.
 */
export function peelOperator(word: string): [string] | [string, string] {
  for (const op of GLUED_OPERATORS) {
    if (word.length > op.length && word.endsWith(op)) {
      const head = word.slice(0, -op.length);
      if (OPERAND_END.test(head)) return [head, op];
    }
  }
  return [word];
}

function closingQuote(src: string, open: number, offset: number): number {
  const quote = src[open];
  const end = src.indexOf(quote, open + 1);
  if (end < 0) throw new CalcError(unterminated(quote === "`" ? "back-quote" : "quote", offset + open));
  return end;
}

// Quoted text inside a macro body may hold parentheses; skip over it.
function matchingParen(src: string, open: number, offset: number): number {
  let depth = 0;
  for (let i = open; i < src.length; i++) {
    const c = src[i];
    if (c === "\"" || c === "`") {
      i = closingQuote(src, i, offset);
    } else if (c === "(") {
      depth++;
    } else if (c === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  throw new CalcError(unterminated("parenthesis", offset + open));
}
