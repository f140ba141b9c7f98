import type { Diagnostic } from "../outcome/codes";

/**
 * Sink port interface.
 * Everything the calculator prints goes through here; the core never
 * touches the console.
 */
export interface MessageSink {
  /**
   * Ordinary output (print directives, listings, help).
   */
  message(text: string): void;

  /**
   * Non-fatal problem; evaluation continues.
   */
  warning(text: string, diagnostic?: Diagnostic): void;

  /**
   * A failed line, already rendered for display.
   */
  error(text: string): void;
}

/**
 * Keeps everything in memory. Used by tests and by callers that want to
 * inspect output after a line.
 */
export class BufferSink implements MessageSink {
  readonly messages: string[] = [];
  readonly warnings: string[] = [];
  readonly diagnostics: Diagnostic[] = [];
  readonly errors: string[] = [];

  message(text: string): void {
    this.messages.push(text);
  }

  warning(text: string, diagnostic?: Diagnostic): void {
    this.warnings.push(text);
    if (diagnostic) this.diagnostics.push(diagnostic);
  }

  error(text: string): void {
    this.errors.push(text);
  }

  clear(): void {
    this.messages.length = 0;
    this.warnings.length = 0;
    this.diagnostics.length = 0;
    this.errors.length = 0;
  }
}

/** Drops everything. */
export const nullSink: MessageSink = {
  message: () => undefined,
  warning: () => undefined,
  error: () => undefined,
};
