// src/core/macro/types.ts
// Macro definitions and the expansion queue entries they produce

import type { Tok } from "../reader/tokenize";

// ─────────────────────────────────────────────────────────────────
// Core Macro Types
// ─────────────────────────────────────────────────────────────────

/**
 * Macro: a named token sequence. Invoking it replays the body
 * in place of the name, against the live stack.
 */
export type Macro = {
  name: string;
  body: readonly Tok[];
  /** Body text as written between the parentheses */
  source: string;
};

/**
 * QueuedTok: a token waiting to be dispatched.
 */
export type QueuedTok = {
  tok: Tok;
  /** Number of macro expansions this token came through */
  depth: number;
  /** Where the top-level token that produced it sits in the input line */
  origin: number;
};
