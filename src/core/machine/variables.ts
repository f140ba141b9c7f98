// src/core/machine/variables.ts
// Named values. Names follow identifier rules and may shadow built-in actions.

import { done, fail, undefinedVariable } from "../../outcome/constructors";
import type { Outcome } from "../../outcome/outcome";
import type { Value } from "../values/value";

export const VARIABLE_NAME = /^[A-Za-z_]\w*$/;

export class VariableStore {
  private bindings = new Map<string, Value>();
  private readonly seeds: ReadonlyMap<string, Value>;

  constructor(seeds: Record<string, Value> = {}) {
    this.seeds = new Map(Object.entries(seeds));
    this.reset();
  }

  store(name: string, v: Value): void {
    if (!VARIABLE_NAME.test(name)) {
      throw new Error(`Invalid variable name: ${name}`);
    }
    this.bindings.set(name, v);
  }

  recall(name: string): Outcome<Value> {
    const v = this.bindings.get(name);
    return v === undefined ? fail(undefinedVariable(name)) : done(v);
  }

  get(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /** Sorted by name, uppercase before lowercase. */
  list(): Array<[string, Value]> {
    return [...this.bindings.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** Back to the seeded bindings. */
  reset(): void {
    this.bindings = new Map(this.seeds);
  }
}
