// src/index.ts
// ec - Public API
//
// Clean interface for the CLI, scripts and embedding applications.

// ═══════════════════════════════════════════════════════════════════════════════
// CALCULATOR
// ═══════════════════════════════════════════════════════════════════════════════

export { createCalculator, DEFAULT_RREF, type CalculatorPorts } from "./calculator";
export { Evaluator, type EvaluatorOptions } from "./core/eval/evaluator";
export { Dispatcher } from "./core/eval/dispatch";
export {
  DEFAULT_MODE,
  type AngleUnit,
  type ConstantSystem,
  type InterpreterMode,
  type InterpreterState,
} from "./core/eval/state";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  NOTATIONS,
  isNotation,
  real,
  integer,
  exactInteger,
  complex,
  value,
  withUnits,
  realPart,
  imagPart,
  type Scalar,
  type Notation,
  type Value,
} from "./core/values/value";
export { DEFAULT_FORMAT, Formatter, engineering, type FormatState } from "./core/format/formatter";
export { parseNumber, looksNumeric, SCALE_FACTORS, CURRENCY_PREFIXES } from "./core/reader/number";
export { tokenize, split, type Tok } from "./core/reader/tokenize";
export { UnitConverter, type ConversionRule } from "./core/units/converter";

// ═══════════════════════════════════════════════════════════════════════════════
// MACHINE STATE
// ═══════════════════════════════════════════════════════════════════════════════

export { StackMachine, type StackSnapshot } from "./core/machine/stack";
export { VariableStore } from "./core/machine/variables";
export { MacroTable, TokenQueue, DEFAULT_MAX_MACRO_DEPTH, type Macro } from "./core/macro";

// ═══════════════════════════════════════════════════════════════════════════════
// ACTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ActionRegistry,
  apropos,
  generateSummary,
  describeTopic,
  listTopics,
  validateDescriptor,
  isKeyed,
  namesOf,
  type ActionDescriptor,
  type KeyedAction,
  type PatternAction,
  type Arity,
  type Handler,
} from "./registry";
export { defaultCatalog, DEFAULT_CONVERSIONS, parseConstants, interpolate, ABOUT_TEXT } from "./catalog";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS, CONFIG & SCRIPTS
// ═══════════════════════════════════════════════════════════════════════════════

export { BufferSink, nullSink, type MessageSink } from "./ports/sink";
export { mathRng, fixedRng, type RngPort } from "./ports/rng";
export * from "./core/config";
export * from "./script";
