// src/calculator.ts
// Builds a ready-to-use Evaluator from a CalcConfig
//
// Usage:
//   import { createCalculator, DEFAULT_CONFIG } from "ec-calculator";
//
//   const calc = createCalculator(DEFAULT_CONFIG);
//   calc.evaluate("4 5 +"); // { tag: "Done", value: "9" }

import { defaultCatalog, DEFAULT_CONVERSIONS } from "./catalog";
import { DEFAULT_CONFIG, validateConfig, type CalcConfig } from "./core/config";
import { Evaluator } from "./core/eval/evaluator";
import type { AngleUnit, ConstantSystem, InterpreterMode } from "./core/eval/state";
import { isNotation, value, type Value } from "./core/values/value";
import type { MessageSink } from "./ports/sink";
import type { RngPort } from "./ports/rng";

export type CalculatorPorts = {
  /** Where print, help and warnings go (default: discarded) */
  sink?: MessageSink;
  /** Random source for rand (default: Math.random) */
  rng?: RngPort;
};

/** Reference impedance used by the dBm conversions. */
export const DEFAULT_RREF: Value = value(50, "Ω");

function angleUnitOf(s: string): AngleUnit {
  if (s === "degrees" || s === "radians") return s;
  throw new Error(`Unknown angle unit: ${s}`);
}

function constantSystemOf(s: string): ConstantSystem {
  if (s === "mks" || s === "cgs") return s;
  throw new Error(`Unknown constant system: ${s}`);
}

/**
 * Create an Evaluator with the default catalog and conversions.
 * Throws if the configuration does not validate.
 */
export function createCalculator(config: CalcConfig = DEFAULT_CONFIG, ports: CalculatorPorts = {}): Evaluator {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join("; ")}`);
  }

  const { notation, digits, spacer } = config.display;
  if (!isNotation(notation)) {
    throw new Error(`Unknown notation: ${notation}`);
  }

  const mode: InterpreterMode = {
    angleUnit: angleUnitOf(config.runtime.angleUnit),
    constantSystem: constantSystemOf(config.runtime.constantSystem),
  };

  const variables: Record<string, Value> = { Rref: DEFAULT_RREF };
  for (const [name, seed] of Object.entries(config.variables)) {
    variables[name] = value(seed.value, seed.units ?? "");
  }

  return new Evaluator({
    catalog: defaultCatalog(),
    format: { notation, digits },
    spacer,
    variables,
    conversions: DEFAULT_CONVERSIONS,
    mode,
    maxMacroDepth: config.runtime.maxMacroDepth,
    sink: ports.sink,
    rng: ports.rng,
  });
}
