// test/helpers/calc.ts
// Shared setup for calculator tests

import { createCalculator } from "../../src/calculator";
import { DEFAULT_CONFIG, type CalcConfig } from "../../src/core/config";
import type { Evaluator } from "../../src/core/eval/evaluator";
import { isFail, type Outcome } from "../../src/outcome/outcome";
import type { Failure } from "../../src/outcome/failure";
import { BufferSink } from "../../src/ports/sink";
import { fixedRng } from "../../src/ports/rng";

export type TestCalc = {
  calc: Evaluator;
  sink: BufferSink;
  /** Evaluate a line and return the new display; throws if the line fails */
  run: (line: string) => string;
  /** Evaluate a line that must fail and return its failure */
  fails: (line: string) => Failure;
};

export function expectDone<A>(o: Outcome<A>): A {
  if (isFail(o)) throw new Error(`expected success, got ${o.failure.kind}: ${o.failure.message}`);
  return o.value;
}

export function expectFail<A>(o: Outcome<A>): Failure {
  if (!isFail(o)) throw new Error(`expected failure, got ${String(o.value)}`);
  return o.failure;
}

export function makeCalc(config: CalcConfig = DEFAULT_CONFIG): TestCalc {
  const sink = new BufferSink();
  const calc = createCalculator(config, { sink, rng: fixedRng([0.25, 0.75]) });
  return {
    calc,
    sink,
    run: line => expectDone(calc.evaluate(line)),
    fails: line => expectFail(calc.evaluate(line)),
  };
}
