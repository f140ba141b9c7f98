// src/core/macro/queue.ts
// Token queue for one input line. Macro bodies are spliced in at the
// front, one level deeper than the token that invoked them.

import { CalcError } from "../../outcome/error";
import { macroRecursionLimit } from "../../outcome/constructors";
import type { Tok } from "../reader/tokenize";
import type { Macro, QueuedTok } from "./types";

export const DEFAULT_MAX_MACRO_DEPTH = 100;

export class TokenQueue {
  private items: QueuedTok[];

  constructor(toks: readonly Tok[], readonly maxDepth = DEFAULT_MAX_MACRO_DEPTH) {
    this.items = toks.map(tok => ({ tok, depth: 0, origin: tok.pos }));
  }

  shift(): QueuedTok | undefined {
    return this.items.shift();
  }

  /** @throws CalcError (MacroRecursionLimit) when the expansion would nest too deep */
  expand(macro: Macro, from: QueuedTok): void {
    const depth = from.depth + 1;
    if (depth > this.maxDepth) {
      throw new CalcError(macroRecursionLimit(macro.name, this.maxDepth));
    }
    const body = macro.body.map(tok => ({ tok, depth, origin: from.origin }));
    this.items.unshift(...body);
  }
}
