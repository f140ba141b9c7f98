// src/catalog/variables.ts
// Store, recall and list variables

import { makeDiagnostic } from "../outcome/codes";
import { unwrap } from "../outcome/outcome";
import type { ActionDescriptor } from "../registry/types";
import { command, pattern } from "./helpers";

const CATEGORY = "Variable Commands";

export const storeAction = pattern(CATEGORY, {
  name: "store",
  usage: "=name",
  pattern: /^=([A-Za-z_]\w*)$/,
  summary: "store value into a variable",
  synopsis: "... → ...",
  detail: "x is copied into the named variable and stays on the stack. " +
    "A variable named like a built-in hides the built-in from then on.",
}, { pop: 0, push: 0, needs: 1 }, ([x], state, [name]) => {
  state.variables.store(name, x);
  if (state.registry.override(name)) {
    state.sink.warning(`${name}: variable has overridden built-in.`, makeDiagnostic("W0001", { name }));
  }
  return [];
});

export const recallAction = pattern(CATEGORY, {
  name: "recall",
  usage: "name",
  pattern: /^([A-Za-z_]\w*)$/,
  summary: "recall value of a variable",
  synopsis: "... → value of name, ...",
}, { pop: 0, push: 1 }, (_args, state, [name]) => [unwrap(state.variables.recall(name))]);

export const listVariables = command(CATEGORY, { key: "vars", summary: "print variables" }, state => {
  for (const [name, v] of state.variables.list()) {
    state.sink.message(`  ${name}: ${state.formatter.render(v)}`);
  }
});

export const variableActions: ActionDescriptor[] = [storeAction, recallAction, listVariables];
