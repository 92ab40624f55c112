import { SexprError } from "@sexpr/core";
import type { ParseFailureKind } from "./types.js";

const MESSAGES: Record<ParseFailureKind, string> = {
  GrammarMismatch: "Parse failed: grammar did not match",
  TrailingInput: "Parse failed: unconsumed trailing input",
};

/** Thrown by `parseAll` when the top-level parse fails. */
export class ParseError extends SexprError {
  readonly kind: ParseFailureKind;

  constructor(kind: ParseFailureKind) {
    super(MESSAGES[kind]);
    this.kind = kind;
  }
}

/**
 * A grammar broke a combinator's contract, e.g. a `many` body that succeeds
 * without consuming input. This is a bug in the grammar, not in the input.
 */
export class GrammarContractError extends SexprError {
  /** Position where the violation was detected. */
  readonly pos: number;

  constructor(message: string, pos: number) {
    super(`${message} (at offset ${pos})`);
    this.pos = pos;
  }
}
