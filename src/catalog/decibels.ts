// src/catalog/decibels.ts
// Decibel conversions. The dBm family measures against the Rref variable.

import { CalcError } from "../outcome/error";
import { undefinedVariable } from "../outcome/constructors";
import type { InterpreterState } from "../core/eval/state";
import { realPart } from "../core/values/value";
import type { KeyedAction } from "../registry/types";
import { domainUnless, realArg, realValue, unary } from "./helpers";

const CATEGORY = "Decibel Functions";

function referenceResistance(state: InterpreterState): number {
  const rref = state.variables.get("Rref");
  if (!rref) throw new CalcError(undefinedVariable("Rref"));
  return realPart(rref.n);
}

function positive(x: number, action: string): number {
  domainUnless(x > 0, action);
  return x;
}

export const decibelActions: KeyedAction[] = [
  unary(CATEGORY, {
    key: "db",
    aliases: ["db20", "v2db", "i2db"],
    summary: "convert voltage or current to dB",
    synopsis: "x, ... → 20*log(x), ...",
  }, x => realValue(20 * Math.log10(positive(realArg(x, "db"), "db")))),

  unary(CATEGORY, {
    key: "adb",
    aliases: ["db2v", "db2i"],
    summary: "convert dB to voltage or current",
    synopsis: "x, ... → 10**(x/20), ...",
  }, x => realValue(10 ** (realArg(x, "adb") / 20))),

  unary(CATEGORY, {
    key: "db10",
    aliases: ["p2db"],
    summary: "convert power to dB",
    synopsis: "x, ... → 10*log(x), ...",
  }, x => realValue(10 * Math.log10(positive(realArg(x, "db10"), "db10")))),

  unary(CATEGORY, {
    key: "adb10",
    aliases: ["db2p"],
    summary: "convert dB to power",
    synopsis: "x, ... → 10**(x/10), ...",
  }, x => realValue(10 ** (realArg(x, "adb10") / 10))),

  unary(CATEGORY, {
    key: "vdbm",
    aliases: ["v2dbm"],
    summary: "convert peak voltage to dBm",
    synopsis: "x, ... → 30+10*log10((x**2)/(2*Rref)), ...",
  }, (x, state) => {
    const v = realArg(x, "vdbm");
    const power = positive((v * v) / referenceResistance(state) / 2, "vdbm");
    return realValue(30 + 10 * Math.log10(power));
  }),

  unary(CATEGORY, {
    key: "dbmv",
    aliases: ["dbm2v"],
    summary: "dBm to peak voltage",
    synopsis: "x, ... → sqrt(2*10**((x-30)/10)*Rref), ...",
  }, (x, state) => {
    const power = 10 ** ((realArg(x, "dbmv") - 30) / 10);
    return realValue(Math.sqrt(2 * power * referenceResistance(state)), "V");
  }),

  unary(CATEGORY, {
    key: "idbm",
    aliases: ["i2dbm"],
    summary: "peak current to dBm",
    synopsis: "x, ... → 30+10*log10((x**2)*Rref/2), ...",
  }, (x, state) => {
    const i = realArg(x, "idbm");
    const power = positive((i * i * referenceResistance(state)) / 2, "idbm");
    return realValue(30 + 10 * Math.log10(power));
  }),

  unary(CATEGORY, {
    key: "dbmi",
    aliases: ["dbm2i"],
    summary: "dBm to peak current",
    synopsis: "x, ... → sqrt(2*10**((x-30)/10)/Rref), ...",
  }, (x, state) => {
    const power = 10 ** ((realArg(x, "dbmi") - 30) / 10);
    return realValue(Math.sqrt((2 * power) / referenceResistance(state)), "A");
  }),
];
