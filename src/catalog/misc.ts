// src/catalog/misc.ts
// Units, conversion, printing, help and session commands

import { makeDiagnostic } from "../outcome/codes";
import { unwrap } from "../outcome/outcome";
import type { InterpreterState } from "../core/eval/state";
import { withUnits } from "../core/values/value";
import { describeTopic, generateSummary, listTopics } from "../registry/docgen";
import { apropos } from "../registry/query";
import type { ActionDescriptor } from "../registry/types";
import { command, pattern } from "./helpers";

const CATEGORY = "Miscellaneous Commands";

const REFERENCE = /\$\$|\$\{(\w+)\}|\$(\w+)|\\n|\\t/g;

export const ABOUT_TEXT = [
  "ec: engineering calculator",
  "A stack-based (RPN) calculator with SI scale factors, units,",
  "complex numbers, variables and user-defined functions.",
].join("\n");

/**
 * Expand $N / ${N} (stack registers, x is 0), $name / ${name} (variables),
 * $$, \n and \t. Unknown references render as $?name? with a warning.
 */
export function interpolate(text: string, state: InterpreterState): string {
  return text.replace(REFERENCE, (match: string, braced?: string, bare?: string) => {
    if (match === "$$") return "$";
    if (match === "\\n") return "\n";
    if (match === "\\t") return "\t";

    const name = braced ?? bare ?? "";
    const v = /^\d+$/.test(name) ? state.stack.peek(parseInt(name, 10)) : state.variables.get(name);
    if (v) return state.formatter.render(v);
    state.sink.warning(`$${name}: unknown.`, makeDiagnostic("W0002", { name }));
    return `$?${name}?`;
  });
}

export const miscActions: ActionDescriptor[] = [
  pattern(CATEGORY, {
    name: "units",
    usage: "\"units\"",
    pattern: /^"(.*)"$/,
    summary: "set the units of the x register",
    synopsis: "x, ... → x \"units\", ...",
  }, { pop: 1, push: 1 }, ([x], _state, [units]) => [withUnits(x, units)]),

  pattern(CATEGORY, {
    name: "convert",
    usage: ">units",
    pattern: /^>(.+)$/,
    summary: "convert value to given units",
    synopsis: "x, ... → x converted to the given units, ...",
  }, { pop: 1, push: 1 }, ([x], state, [target]) => [unwrap(state.units.convert(x, target))]),

  pattern(CATEGORY, {
    name: "?",
    usage: "?topic",
    pattern: /^\?(\S*)$/,
    summary: "detailed help on a particular topic",
  }, { pop: 0, push: 0 }, (_args, state, [topic]) => {
    if (topic === "") {
      for (const line of listTopics(state.registry)) state.sink.message(line);
      return [];
    }
    const lines = describeTopic(state.registry, state.macros, topic);
    if (lines) {
      for (const line of lines) state.sink.message(line);
      return [];
    }
    state.sink.warning(`${topic}: not found.`, makeDiagnostic("W0003", { topic }));
    const related = apropos(state.registry, topic);
    if (related.length > 0) state.sink.message(`see also: ${related.join(", ")}`);
    return [];
  }),

  pattern(CATEGORY, {
    name: "print",
    usage: "`text`",
    pattern: /^`(.*)`$/,
    summary: "print text",
    detail: "$0, $1, ... print stack registers (x is $0); $name prints a variable. " +
      "${...} delimits a reference and $$ prints a dollar sign. Empty text prints x.",
  }, { pop: 0, push: 0 }, (_args, state, [text]) => {
    if (text === "") {
      const x = state.stack.x;
      state.sink.message(x ? state.formatter.render(x) : "");
    } else {
      state.sink.message(interpolate(text, state));
    }
    return [];
  }),

  command(CATEGORY, {
    key: "functions",
    summary: "print user-defined functions",
    detail: "Each function is printed as it would be typed to define it, sorted by name.",
  }, state => {
    for (const { name } of state.macros.list()) {
      const definition = state.macros.render(name);
      if (definition) state.sink.message(`  ${definition}`);
    }
  }),

  command(CATEGORY, { key: "about", summary: "print information about this calculator" }, state => {
    state.sink.message(ABOUT_TEXT);
  }),

  command(CATEGORY, {
    key: "quit",
    aliases: [":q"],
    summary: "quit (:q or ^D also works)",
  }, state => {
    state.exitRequested = true;
  }),

  command(CATEGORY, { key: "help", summary: "print a summary of the available features" }, state => {
    state.sink.message(generateSummary(state.registry));
  }),
];
