// src/core/eval/dispatch.ts
// Resolves each token to an action and applies it to the interpreter state.
//
// Resolution order, first match wins:
//   1. exact key or alias     3. number literal
//   2. macro name             4. pattern actions, in registration order
// A handler sees its operands before anything is popped, so a throwing
// handler leaves the stack as it found it.

import { CalcError, isCalcError } from "../../outcome/error";
import { done, fail, insufficientOperands, unknownToken } from "../../outcome/constructors";
import { locate } from "../../outcome/failure";
import { isDone, type Outcome } from "../../outcome/outcome";
import type { ActionDescriptor } from "../../registry/types";
import type { Tok } from "../reader/tokenize";
import { parseNumber } from "../reader/number";
import { DEFAULT_MAX_MACRO_DEPTH, TokenQueue } from "../macro/queue";
import type { QueuedTok } from "../macro/types";
import type { InterpreterState } from "./state";

export class Dispatcher {
  constructor(
    private readonly state: InterpreterState,
    readonly maxMacroDepth = DEFAULT_MAX_MACRO_DEPTH
  ) {}

  /** Dispatch a single raw token. */
  dispatch(token: string): Outcome<string> {
    return this.run([{ tag: "Word", s: token, pos: 0 }]);
  }

  /**
   * Dispatch tokens in order until they run out, one fails or quit is
   * requested. Returns the rendered x register.
   * Does not roll back earlier tokens on failure; the Evaluator does that.
   */
  run(toks: readonly Tok[]): Outcome<string> {
    const queue = new TokenQueue(toks, this.maxMacroDepth);
    let entry = queue.shift();
    while (entry && !this.state.exitRequested) {
      try {
        this.step(entry, queue);
      } catch (e) {
        if (isCalcError(e)) return fail(locate(e.failure, entry.tok.s, entry.origin));
        throw e;
      }
      entry = queue.shift();
    }
    return done(this.display());
  }

  /** The x register as the prompt shows it, or "" on an empty stack. */
  display(): string {
    const x = this.state.stack.x;
    return x ? this.state.formatter.render(x) : "";
  }

  private step(entry: QueuedTok, queue: TokenQueue): void {
    const { tok } = entry;
    if (tok.tag === "Define") {
      this.state.macros.define(tok.name, tok.body, tok.s.slice(1, tok.s.length - tok.name.length - 1));
      return;
    }

    const token = tok.s;
    const keyed = this.state.registry.lookup(token);
    if (keyed) {
      this.invoke(keyed, token, []);
      return;
    }

    const macro = this.state.macros.lookup(token);
    if (macro) {
      queue.expand(macro, entry);
      return;
    }

    const number = parseNumber(token);
    if (number) {
      if (!isDone(number)) throw new CalcError(number.failure);
      this.state.stack.push(number.value);
      return;
    }

    const matched = this.state.registry.matchPattern(token);
    if (matched) {
      this.invoke(matched.action, token, matched.captures);
      return;
    }

    throw new CalcError(unknownToken(token));
  }

  private invoke(action: ActionDescriptor, token: string, captures: readonly string[]): void {
    const { stack } = this.state;
    const { pop, push } = action.arity;
    const need = Math.max(pop, action.arity.needs ?? 0);
    if (stack.depth < need) {
      throw new CalcError(insufficientOperands(token, need, stack.depth));
    }

    const args = stack.peekN(need);
    if (pop > 0) stack.rememberX();
    const results = action.handler(args, this.state, captures);
    if (results.length !== push) {
      throw new Error(`${action.name} declared ${push} result(s) but produced ${results.length}`);
    }

    stack.pop(pop, token);
    stack.pushResults(results);
  }
}
