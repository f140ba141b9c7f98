import type { InterpreterState } from "../core/eval/state";
import type { Value } from "../core/values/value";

/**
 * Stack effect of an action.
 * Operands are checked against max(pop, needs) before the handler runs.
 */
export interface Arity {
  pop: number;
  push: number;
  /** Values that must be present but stay on the stack (e.g. storing x) */
  needs?: number;
}

export interface ActionDoc {
  /** One line, used in the help listing */
  summary: string;
  /** Stack picture, e.g. "x, y → x·y" */
  synopsis?: string;
  /** Longer text shown by ?topic */
  detail?: string;
}

/**
 * Computes results from the operands; both are x first.
 * Signals failure by throwing CalcError. The stack is only touched
 * after it returns.
 */
export type Handler = (
  args: readonly Value[],
  state: InterpreterState,
  captures: readonly string[]
) => Value[];

interface ActionBase {
  /** Canonical id, unique across the registry */
  name: string;
  /** Help section */
  category: string;
  arity: Arity;
  doc: ActionDoc;
  handler: Handler;
}

/** Invoked by an exact token (or one of its aliases). */
export interface KeyedAction extends ActionBase {
  kind: "keyed";
  key: string;
  aliases: readonly string[];
}

/** Invoked by any token matching an anchored pattern; groups become captures. */
export interface PatternAction extends ActionBase {
  kind: "pattern";
  pattern: RegExp;
  /** How the pattern is written in help, e.g. "=name" */
  usage: string;
}

export type ActionDescriptor = KeyedAction | PatternAction;

export function isKeyed(d: ActionDescriptor): d is KeyedAction {
  return d.kind === "keyed";
}

/** The names a user can type or ask help about. */
export function namesOf(d: ActionDescriptor): string[] {
  return d.kind === "keyed" ? [d.key, ...d.aliases] : [d.usage];
}
