// src/core/macro/table.ts
// Named macro definitions. Redefining a name replaces the old body.

import type { Tok } from "../reader/tokenize";
import type { Macro } from "./types";

export class MacroTable {
  private macros = new Map<string, Macro>();

  define(name: string, body: readonly Tok[], source = body.map(t => t.s).join(" ")): Macro {
    const macro: Macro = { name, body, source };
    this.macros.set(name, macro);
    return macro;
  }

  lookup(name: string): Macro | undefined {
    return this.macros.get(name);
  }

  has(name: string): boolean {
    return this.macros.has(name);
  }

  /** The definition as it would be typed. */
  render(name: string): string | undefined {
    const macro = this.macros.get(name);
    return macro && `(${macro.source})${macro.name}`;
  }

  /** Sorted by name. */
  list(): Macro[] {
    return [...this.macros.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
