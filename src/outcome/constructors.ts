// src/outcome/constructors.ts
// Outcome builders and one Failure constructor per error kind

import type { Done, Fail } from "./outcome";
import { failure, type Failure } from "./failure";
import { makeDiagnostic, type Diagnostic } from "./codes";

export function done<A>(value: A): Done<A> {
  return { tag: "Done", value };
}

export function fail(f: Failure): Fail {
  return { tag: "Fail", failure: f };
}

// =========================================================================
// Failure constructors, one per error kind
// =========================================================================

export function syntaxError(message: string, position?: number, diagnostic?: Diagnostic): Failure {
  return failure("SyntaxError", message, {
    position,
    diagnostics: [diagnostic ?? makeDiagnostic("E0004", { message }, position)],
  });
}

export function unterminated(what: string, position: number): Failure {
  return syntaxError(`unterminated ${what}.`, position, makeDiagnostic("E0001", { what }, position));
}

export function unbalancedParens(position: number): Failure {
  return syntaxError("unbalanced parentheses.", position, makeDiagnostic("E0002", undefined, position));
}

export function unnamedMacro(position: number): Failure {
  return syntaxError("macro definition needs a name.", position, makeDiagnostic("E0003", undefined, position));
}

export function unknownToken(token: string): Failure {
  return failure("UnknownToken", `${token}: unrecognized.`, {
    diagnostics: [makeDiagnostic("E0100", { token })],
  });
}

export function undefinedVariable(name: string): Failure {
  return failure("UnknownToken", `${name}: variable does not exist.`, {
    diagnostics: [makeDiagnostic("E0101", { name })],
  });
}

export function insufficientOperands(action: string, need: number, have: number): Failure {
  return failure("InsufficientOperands", `${action}: needs ${need} value${need === 1 ? "" : "s"} on the stack.`, {
    context: { need, have },
    diagnostics: [makeDiagnostic("E0200", { need, have })],
  });
}

export function numberFormatError(token: string, notation: string): Failure {
  return failure("NumberFormatError", `${token}: invalid ${notation} number.`, {
    diagnostics: [makeDiagnostic("E0300", { notation, token })],
  });
}

export function divisionByZero(): Failure {
  return failure("DomainError", "division by zero.", {
    diagnostics: [makeDiagnostic("E0400")],
  });
}

export function mathDomainError(action: string): Failure {
  return failure("DomainError", "math domain error.", {
    diagnostics: [makeDiagnostic("E0401", { action })],
  });
}

export function domainError(message: string, action: string): Failure {
  return failure("DomainError", message, {
    diagnostics: [makeDiagnostic("E0401", { action })],
  });
}

export function missingConstant(name: string, system: string): Failure {
  return failure("DomainError", `${name}: not available in ${system} units.`, {
    diagnostics: [makeDiagnostic("E0402", { name, system })],
  });
}

export function unitMismatch(from: string, to: string): Failure {
  const source = from === "" ? "unitless value" : `"${from}"`;
  return failure("UnitMismatch", `cannot convert ${source} to "${to}".`, {
    diagnostics: [makeDiagnostic("E0500", { from, to })],
  });
}

export function macroRecursionLimit(name: string, limit: number): Failure {
  return failure("MacroRecursionLimit", `${name}: macro expansion exceeds depth ${limit}.`, {
    context: { limit },
    diagnostics: [makeDiagnostic("E0600", { limit })],
  });
}
