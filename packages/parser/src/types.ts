/**
 * Core types for @sexpr/parser
 *
 * Defines the parse result, the parser interface and the top-level outcome.
 */

/**
 * Result of applying a parser at a position. On failure `pos` is the
 * position the parser was applied at: nothing is consumed.
 */
export type ParseResult<T> =
  | { ok: true; value: T; pos: number }
  | { ok: false; pos: number };

/** A parser is a pure function from (input, position) to ParseResult. */
export interface Parser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
  /**
   * Parse the full input (surrounding whitespace allowed), throwing
   * `ParseError` if it does not match or is not consumed entirely.
   */
  parseAll(input: string): T;
}

/** Value type produced by a parser. */
export type ParserValue<P> = P extends Parser<infer T> ? T : never;

/** Present/absent indicator produced by `optional`. */
export type Optional<T> = { present: true; value: T } | { present: false };

/**
 * Why a top-level parse failed.
 *
 * - `GrammarMismatch`: the grammar did not match the input.
 * - `TrailingInput`: the grammar matched a prefix, but input remains.
 */
export type ParseFailureKind = "GrammarMismatch" | "TrailingInput";

export interface ParseFailure {
  readonly kind: ParseFailureKind;
}

/** Outcome of the top-level `parse`. */
export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseFailure };
