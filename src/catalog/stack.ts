// src/catalog/stack.ts
// Stack commands

import { value } from "../core/values/value";
import type { KeyedAction } from "../registry/types";
import { command, keyed } from "./helpers";

const CATEGORY = "Stack Commands";

export const stackActions: KeyedAction[] = [
  keyed(CATEGORY, {
    key: "swap",
    summary: "swap x and y",
    synopsis: "x, y, ... → y, x, ...",
  }, { pop: 0, push: 0, needs: 2 }, (_args, state) => {
    state.stack.swap();
    return [];
  }),

  keyed(CATEGORY, {
    key: "dup",
    aliases: ["enter"],
    summary: "duplicate x",
    synopsis: "x, ... → x, x, ...",
  }, { pop: 0, push: 1, needs: 1 }, ([x]) => [x]),

  keyed(CATEGORY, {
    key: "pop",
    aliases: ["clrx"],
    summary: "discard x",
    synopsis: "x, ... → ...",
  }, { pop: 1, push: 0 }, () => []),

  keyed(CATEGORY, {
    key: "lastx",
    summary: "recall previous value of x",
    synopsis: "... → lastx, ...",
    detail: "lastx holds the value x had just before the most recent operation that consumed it.",
  }, { pop: 0, push: 1 }, (_args, state) => [state.stack.lastx ?? value(0)]),

  command(CATEGORY, { key: "stack", summary: "print stack" }, state => {
    const values = state.stack.values();
    values.forEach((v, i) => {
      const register = values.length - 1 - i;
      const label = register === 0 ? "x:" : register === 1 ? "y:" : "  ";
      state.sink.message(`  ${label} ${state.formatter.render(v)}`);
    });
  }),

  command(CATEGORY, {
    key: "clstack",
    summary: "clear stack",
    synopsis: "... →",
  }, state => state.stack.clear()),
];
