// src/core/units/converter.ts
// Affine unit conversions between named alias sets.

import { done, fail, unitMismatch } from "../../outcome/constructors";
import type { Outcome } from "../../outcome/outcome";
import { complex, imagPart, realPart, type Value } from "../values/value";

/** to = slope * from + intercept, for any pair of names from the two alias sets. */
export interface ConversionRule {
  from: readonly string[];
  to: readonly string[];
  slope: number;
  intercept?: number;
}

type Direction = { rule: ConversionRule; forward: boolean };

export class UnitConverter {
  private rules: ConversionRule[] = [];

  constructor(rules: readonly ConversionRule[] = []) {
    for (const rule of rules) this.addRule(rule);
  }

  addRule(rule: ConversionRule): void {
    if (rule.from.length === 0 || rule.to.length === 0) {
      throw new Error("Conversion rule needs at least one unit name on each side");
    }
    if (rule.slope === 0 || !Number.isFinite(rule.slope)) {
      throw new Error(`Conversion ${rule.from[0]} -> ${rule.to[0]} has an unusable slope`);
    }
    this.rules.push(rule);
  }

  convert(v: Value, target: string): Outcome<Value> {
    const found = this.find(v.units, target);
    if (!found) return fail(unitMismatch(v.units, target));

    const { rule, forward } = found;
    if (found.relabel) return done({ ...v, units: target });

    const intercept = rule.intercept ?? 0;
    const apply = forward
      ? (x: number) => rule.slope * x + intercept
      : (x: number) => (x - intercept) / rule.slope;
    // The offset only applies to the real part.
    const n = complex(apply(realPart(v.n)), imagPart(v.n) * (forward ? rule.slope : 1 / rule.slope));
    return done({ ...v, n, units: target });
  }

  private find(from: string, target: string): (Direction & { relabel: boolean }) | undefined {
    if (!from) return undefined;
    for (const rule of this.rules) {
      if (rule.from.includes(from) && rule.to.includes(target)) return { rule, forward: true, relabel: false };
      if (rule.to.includes(from) && rule.from.includes(target)) return { rule, forward: false, relabel: false };
      if (rule.from.includes(from) && rule.from.includes(target)) return { rule, forward: true, relabel: true };
      if (rule.to.includes(from) && rule.to.includes(target)) return { rule, forward: false, relabel: true };
    }
    return undefined;
  }
}
