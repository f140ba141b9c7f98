// src/catalog/constants.ts
// Physical and mathematical constants, loaded from data/constants.json.
// A constant may have one value for every system or separate mks/cgs values.

import constantsData from "./data/constants.json";
import { CalcError } from "../outcome/error";
import { missingConstant } from "../outcome/constructors";
import type { ConstantSystem } from "../core/eval/state";
import { complex } from "../core/values/value";
import type { KeyedAction } from "../registry/types";
import { command, nullary } from "./helpers";

const CATEGORY = "Constants";

export interface Quantity {
  value: number;
  imag?: number;
  units?: string;
}

export interface ConstantSpec {
  key: string;
  aliases: string[];
  summary: string;
  /** "any" applies when the current system has no entry of its own */
  values: Partial<Record<ConstantSystem | "any", Quantity>>;
}

const SYSTEMS = ["any", "mks", "cgs"] as const;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readQuantity(v: unknown, where: string): Quantity {
  if (!isRecord(v) || typeof v.value !== "number") {
    throw new Error(`${where}: expected { value: number }`);
  }
  const q: Quantity = { value: v.value };
  if (typeof v.imag === "number") q.imag = v.imag;
  else if (v.imag !== undefined) throw new Error(`${where}: imag must be a number`);
  if (typeof v.units === "string") q.units = v.units;
  else if (v.units !== undefined) throw new Error(`${where}: units must be a string`);
  return q;
}

/**
 * Validate constant definitions read from JSON.
 * @throws Error naming the first malformed entry
 */
export function parseConstants(data: unknown): ConstantSpec[] {
  if (!Array.isArray(data)) throw new Error("constants: expected an array");
  return data.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.key !== "string" || typeof entry.summary !== "string") {
      throw new Error(`constants[${i}]: expected key and summary strings`);
    }
    const aliases = entry.aliases ?? [];
    if (!Array.isArray(aliases) || !aliases.every((a): a is string => typeof a === "string")) {
      throw new Error(`constants[${i}]: aliases must be strings`);
    }
    if (!isRecord(entry.values)) throw new Error(`constants[${i}]: missing values`);

    const values: ConstantSpec["values"] = {};
    for (const system of SYSTEMS) {
      const q = entry.values[system];
      if (q !== undefined) values[system] = readQuantity(q, `constants[${i}].values.${system}`);
    }
    return { key: entry.key, aliases, summary: entry.summary, values };
  });
}

function constant(spec: ConstantSpec): KeyedAction {
  return nullary(CATEGORY, {
    key: spec.key,
    aliases: spec.aliases,
    summary: spec.summary,
    synopsis: `... → ${spec.key}, ...`,
  }, state => {
    const system = state.mode.constantSystem;
    const q = spec.values[system] ?? spec.values.any;
    if (!q) throw new CalcError(missingConstant(spec.key, system));
    return { n: complex(q.value, q.imag ?? 0), units: q.units ?? "" };
  });
}

function setSystem(constantSystem: ConstantSystem, summary: string): KeyedAction {
  return command(CATEGORY, { key: constantSystem, summary }, state => {
    state.mode = { ...state.mode, constantSystem };
  });
}

export function constantActions(specs: readonly ConstantSpec[] = parseConstants(constantsData)): KeyedAction[] {
  return [
    ...specs.map(constant),
    setSystem("mks", "use MKS units for constants"),
    setSystem("cgs", "use ESU CGS units for constants"),
  ];
}
