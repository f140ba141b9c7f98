import type { Diagnostic } from "./codes";

export type CalcErrorKind =
  | "SyntaxError"
  | "UnknownToken"
  | "InsufficientOperands"
  | "NumberFormatError"
  | "DomainError"
  | "UnitMismatch"
  | "MacroRecursionLimit";

export interface Failure {
  kind: CalcErrorKind;
  message: string;
  /** Token being dispatched when the failure happened */
  token?: string;
  /** Character offset of that token within the evaluated line */
  position?: number;
  context?: Record<string, string | number>;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  kind: CalcErrorKind,
  message: string,
  opts?: Partial<Omit<Failure, "kind" | "message">>
): Failure {
  return {
    kind,
    message,
    diagnostics: opts?.diagnostics ?? [],
    token: opts?.token,
    position: opts?.position,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, string | number>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

/**
 * Attach the token and its position unless the failure already names one.
 * Failures raised inside a macro body keep the position of the invocation.
 */
export function locate(f: Failure, token: string, position: number): Failure {
  if (f.token !== undefined) return f;
  return { ...f, token, position };
}

export function isFailureKind(f: Failure, kind: CalcErrorKind): boolean {
  return f.kind === kind;
}
