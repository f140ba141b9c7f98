// src/core/machine/stack.ts
// The operand stack. Register x is the top, y the one beneath it.

import { CalcError } from "../../outcome/error";
import { insufficientOperands } from "../../outcome/constructors";
import type { Value } from "../values/value";

export interface StackSnapshot {
  readonly values: readonly Value[];
}

export class StackMachine {
  /** Bottom first; the last element is x. */
  private items: Value[] = [];
  private lastxValue: Value | undefined;

  get depth(): number {
    return this.items.length;
  }

  get x(): Value | undefined {
    return this.peek(0);
  }

  get y(): Value | undefined {
    return this.peek(1);
  }

  /** x as it was just before the most recent operation that consumed operands. */
  get lastx(): Value | undefined {
    return this.lastxValue;
  }

  peek(register: number): Value | undefined {
    return this.items[this.items.length - 1 - register];
  }

  /** The top n values, x first. */
  peekN(n: number): Value[] {
    return this.items.slice(this.items.length - n).reverse();
  }

  push(v: Value): void {
    this.items.push(v);
  }

  /** Push values given x first, so the first one ends up on top. */
  pushResults(results: readonly Value[]): void {
    for (let i = results.length - 1; i >= 0; i--) this.items.push(results[i]);
  }

  /** Remove the top n values and return them x first. */
  pop(n = 1, action = "pop"): Value[] {
    if (n > this.items.length) {
      throw new CalcError(insufficientOperands(action, n, this.items.length));
    }
    return this.items.splice(this.items.length - n, n).reverse();
  }

  rememberX(): void {
    this.lastxValue = this.x;
  }

  clear(): void {
    this.items = [];
  }

  dup(): void {
    const [x] = this.pop(1, "dup");
    this.items.push(x, x);
  }

  swap(): void {
    const [x, y] = this.pop(2, "swap");
    this.items.push(x, y);
  }

  /** Bottom first. */
  values(): readonly Value[] {
    return [...this.items];
  }

  snapshot(): StackSnapshot {
    return { values: [...this.items] };
  }

  restore(snapshot: StackSnapshot): void {
    this.items = [...snapshot.values];
  }
}
