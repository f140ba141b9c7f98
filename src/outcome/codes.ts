// src/outcome/codes.ts
// Diagnostics: stable codes attached to failures and warnings, so callers
// can react to a kind of problem without parsing messages.

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Character offset of the offending token within its line */
  position?: number;
  data?: Record<string, string | number>;
}

type DiagnosticOpts = Pick<Diagnostic, "position" | "data">;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Unterminated {what}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced parentheses" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Macro definition needs a name" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "{message}" },

  E0100: { code: "E0100", severity: "error", category: "Lookup", template: "Unrecognized token: {token}" },
  E0101: { code: "E0101", severity: "error", category: "Lookup", template: "Undefined variable: {name}" },

  E0200: { code: "E0200", severity: "error", category: "Stack", template: "Insufficient operands: need {need}, have {have}" },

  E0300: { code: "E0300", severity: "error", category: "Number", template: "Invalid {notation} literal: {token}" },

  E0400: { code: "E0400", severity: "error", category: "Domain", template: "Division by zero" },
  E0401: { code: "E0401", severity: "error", category: "Domain", template: "Math domain error in {action}" },
  E0402: { code: "E0402", severity: "error", category: "Domain", template: "Constant {name} has no {system} value" },

  E0500: { code: "E0500", severity: "error", category: "Units", template: "No conversion from {from} to {to}" },

  E0600: { code: "E0600", severity: "error", category: "Macro", template: "Macro expansion deeper than {limit}" },

  W0001: { code: "W0001", severity: "warning", category: "Variables", template: "Variable {name} overrides a built-in" },
  W0002: { code: "W0002", severity: "warning", category: "Print", template: "Unknown reference {name}" },
  W0003: { code: "W0003", severity: "warning", category: "Help", template: "No help for {topic}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  position?: number
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const opts = { position, data: params };
  return def.severity === "error"
    ? errorDiag(def.code, message, opts)
    : warnDiag(def.code, message, opts);
}
