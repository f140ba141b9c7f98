// src/script/runner.ts
// Runs multi-line text (rc files, start-up files, script arguments)
// through an Evaluator, one line at a time.

import { done, fail } from "../outcome/constructors";
import { wrapFailure, type Failure } from "../outcome/failure";
import { isFail, type Outcome } from "../outcome/outcome";
import type { Evaluator } from "../core/eval/evaluator";
import { nullSink, type MessageSink } from "../ports/sink";

/**
 * interactive: report a failed line and keep going (the line is rolled back).
 * fatal: stop at the first failed line and return its failure.
 */
export type ScriptPolicy = "interactive" | "fatal";

export type LineTrace = {
  source: string;
  line: number;
  text: string;
  /** Display after the line ran, or undefined if it failed */
  display?: string;
};

export type ScriptOptions = {
  /** Name used in failure messages (file name, or "<arg>") */
  source?: string;
  policy?: ScriptPolicy;
  /** Receives failures under the interactive policy */
  sink?: MessageSink;
  /** Called after every line; the CLI uses it for --verbose */
  onLine?: (trace: LineTrace) => void;
};

/**
 * Render a failure with the line it came from and a caret under the
 * offending token.
 */
export function describeFailure(f: Failure, line?: string): string {
  if (line === undefined || f.position === undefined) return f.message;
  return [f.message, `    ${line}`, `    ${" ".repeat(f.position)}^`].join("\n");
}

/**
 * Evaluate every line of text in order. Returns the display after the
 * last line, or the failure that stopped the script.
 */
export function runScript(calc: Evaluator, text: string, options: ScriptOptions = {}): Outcome<string> {
  const source = options.source ?? "<script>";
  const policy = options.policy ?? "fatal";
  const sink = options.sink ?? nullSink;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (calc.exitRequested) break;

    const line = lines[i];
    const result = calc.evaluate(line);
    options.onLine?.({
      source,
      line: i + 1,
      text: line,
      display: isFail(result) ? undefined : result.value,
    });
    if (!isFail(result)) continue;

    const located = wrapFailure(result.failure, `${source}:${i + 1}: ${result.failure.message}`, {
      source,
      line: i + 1,
    });
    if (policy === "fatal") return fail(located);
    sink.error(describeFailure(located, line));
  }
  return done(calc.display());
}
