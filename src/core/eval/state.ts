// src/core/eval/state.ts
// Everything an action handler may read or change, in one explicit record

import type { Formatter } from "../format/formatter";
import type { MacroTable } from "../macro/table";
import type { StackMachine } from "../machine/stack";
import type { VariableStore } from "../machine/variables";
import type { UnitConverter } from "../units/converter";
import type { ActionRegistry } from "../../registry/registry";
import type { MessageSink } from "../../ports/sink";
import type { RngPort } from "../../ports/rng";

export type AngleUnit = "radians" | "degrees";
export type ConstantSystem = "mks" | "cgs";

export interface InterpreterMode {
  angleUnit: AngleUnit;
  constantSystem: ConstantSystem;
}

export const DEFAULT_MODE: InterpreterMode = { angleUnit: "degrees", constantSystem: "mks" };

export interface InterpreterState {
  readonly stack: StackMachine;
  readonly variables: VariableStore;
  readonly macros: MacroTable;
  readonly formatter: Formatter;
  readonly units: UnitConverter;
  readonly registry: ActionRegistry;
  readonly sink: MessageSink;
  readonly rng: RngPort;
  /** Persists across lines; only mode commands change it */
  mode: InterpreterMode;
  /** Set by quit; the rest of the line is skipped */
  exitRequested: boolean;
}
