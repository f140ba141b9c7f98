import type { ActionDescriptor } from "./types";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateDescriptor(descriptor: ActionDescriptor): ValidationResult {
  const errors: string[] = [];
  const id = descriptor.name || "<unknown>";

  if (!descriptor.name) {
    errors.push("missing name");
  }
  if (!descriptor.category) {
    errors.push(`${id}: missing category`);
  }
  if (!descriptor.doc?.summary) {
    errors.push(`${id}: missing doc.summary`);
  }

  const { pop, push, needs } = descriptor.arity;
  if (![pop, push, needs ?? 0].every(n => Number.isInteger(n) && n >= 0)) {
    errors.push(`${id}: arity counts must be non-negative integers`);
  }
  if (needs !== undefined && needs < pop) {
    errors.push(`${id}: needs (${needs}) is less than pop (${pop})`);
  }

  if (descriptor.kind === "keyed") {
    if (!descriptor.key || /\s/.test(descriptor.key)) {
      errors.push(`${id}: key must be a single non-empty token`);
    }
  } else {
    const src = descriptor.pattern.source;
    if (!src.startsWith("^") || !src.endsWith("$")) {
      errors.push(`${id}: pattern must be anchored at both ends`);
    }
    if (descriptor.pattern.global || descriptor.pattern.sticky) {
      errors.push(`${id}: pattern must not be global or sticky`);
    }
  }

  return { valid: errors.length === 0, errors };
}
