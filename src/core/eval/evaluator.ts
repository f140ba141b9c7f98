// src/core/eval/evaluator.ts
// Line-level evaluation: one line is one atomic unit. The stack is
// snapshotted first and restored if anything on the line fails.

import { attempt, isFail, type Outcome } from "../../outcome/outcome";
import { ActionRegistry } from "../../registry/registry";
import type { ActionDescriptor } from "../../registry/types";
import { nullSink, type MessageSink } from "../../ports/sink";
import { mathRng, type RngPort } from "../../ports/rng";
import { DEFAULT_FORMAT, Formatter, type FormatState } from "../format/formatter";
import { MacroTable } from "../macro/table";
import { StackMachine, type StackSnapshot } from "../machine/stack";
import { VariableStore } from "../machine/variables";
import { split, tokenize } from "../reader/tokenize";
import { UnitConverter, type ConversionRule } from "../units/converter";
import type { Value } from "../values/value";
import { Dispatcher } from "./dispatch";
import { DEFAULT_MODE, type InterpreterMode, type InterpreterState } from "./state";

export interface EvaluatorOptions {
  /** Built-in actions; patterns are tried in this order */
  catalog: readonly ActionDescriptor[];
  format?: FormatState;
  /** Text between a number and its units */
  spacer?: string;
  variables?: Record<string, Value>;
  conversions?: readonly ConversionRule[];
  mode?: InterpreterMode;
  maxMacroDepth?: number;
  sink?: MessageSink;
  rng?: RngPort;
}

export class Evaluator {
  readonly state: InterpreterState;
  private readonly dispatcher: Dispatcher;

  constructor(options: EvaluatorOptions) {
    this.state = {
      stack: new StackMachine(),
      variables: new VariableStore(options.variables),
      macros: new MacroTable(),
      formatter: new Formatter(options.format ?? DEFAULT_FORMAT, options.spacer),
      units: new UnitConverter(options.conversions),
      registry: ActionRegistry.from(options.catalog),
      sink: options.sink ?? nullSink,
      rng: options.rng ?? mathRng,
      mode: { ...(options.mode ?? DEFAULT_MODE) },
      exitRequested: false,
    };
    this.dispatcher = new Dispatcher(this.state, options.maxMacroDepth);
  }

  /**
   * Evaluate one line. Returns the new rendering of x ("" when the stack
   * is empty). On failure the stack is as it was before the line.
   */
  evaluate(line: string): Outcome<string> {
    const snapshot = this.state.stack.snapshot();
    const toks = attempt(() => tokenize(line));
    if (isFail(toks)) return toks;

    const result = this.dispatcher.run(toks.value);
    if (isFail(result)) this.state.stack.restore(snapshot);
    return result;
  }

  /** Dispatch a single token outside of any line. */
  dispatch(token: string): Outcome<string> {
    return this.dispatcher.dispatch(token);
  }

  split(line: string): Outcome<string[]> {
    return attempt(() => split(line));
  }

  format(v: Value): string {
    return this.state.formatter.render(v);
  }

  /** Current x as displayed, "" on an empty stack. */
  display(): string {
    return this.dispatcher.display();
  }

  prompt(): string {
    return `${this.display()}: `;
  }

  snapshotStack(): StackSnapshot {
    return this.state.stack.snapshot();
  }

  restoreStack(snapshot: StackSnapshot): void {
    this.state.stack.restore(snapshot);
  }

  clearStack(): void {
    this.state.stack.clear();
  }

  get exitRequested(): boolean {
    return this.state.exitRequested;
  }
}
