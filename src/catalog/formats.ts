// src/catalog/formats.ts
// Display format setters: the name, optionally followed by one or two digits.

import type { Notation } from "../core/values/value";
import type { PatternAction } from "../registry/types";
import { pattern } from "./helpers";

const CATEGORY = "Number Formats";

const SETTERS: ReadonlyArray<[token: string, notation: Notation, summary: string]> = [
  ["fix", "fixed", "use fixed notation"],
  ["si", "si", "use SI notation"],
  ["eng", "eng", "use engineering notation"],
  ["sci", "sci", "use scientific notation"],
  ["hex", "hex", "use hexadecimal notation"],
  ["oct", "oct", "use octal notation"],
  ["bin", "bin", "use binary notation"],
  ["vhex", "v-hex", "use Verilog hexadecimal notation"],
  ["vdec", "v-dec", "use Verilog decimal notation"],
  ["voct", "v-oct", "use Verilog octal notation"],
  ["vbin", "v-bin", "use Verilog binary notation"],
];

function setter(token: string, notation: Notation, summary: string): PatternAction {
  return pattern(CATEGORY, {
    name: token,
    usage: `${token}[N]`,
    pattern: new RegExp(`^${token}(\\d{1,2})?$`),
    summary,
    detail: "N is the precision for real formats and the minimum width for integer ones. " +
      "Without N the current value is kept.",
  }, { pop: 0, push: 0 }, (_args, state, [digits]) => {
    state.formatter.setNotation(notation, digits ? parseInt(digits, 10) : undefined);
    return [];
  });
}

export const formatActions: PatternAction[] = SETTERS.map(([token, notation, summary]) =>
  setter(token, notation, summary)
);
