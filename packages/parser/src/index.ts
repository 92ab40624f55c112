/**
 * @sexpr/parser
 *
 * A small parser combinator engine with PEG semantics.
 *
 * Provides:
 * - primitive parsers (literal, character classes, end of input)
 * - combinators (sequence, choice, repetition, optional, map, delimited, separated lists)
 * - explicit whitespace skipping
 * - a top-level `parse` that requires the whole input to be consumed
 *
 * @module
 */

// Core types
export type {
  ParseResult,
  Parser,
  ParserValue,
  Optional,
  ParseFailure,
  ParseFailureKind,
  ParseOutcome,
} from "./types.js";

// Errors
export { ParseError, GrammarContractError } from "./errors.js";

// Combinator API
export {
  parse,
  literal,
  charMatching,
  char,
  charRange,
  oneOf,
  noneOf,
  anyChar,
  regex,
  eof,
  sequence,
  sequence3,
  keepLeft,
  keepRight,
  delimited,
  choice,
  many,
  many1,
  until,
  optional,
  not,
  map,
  flatMap,
  separatedList,
  separatedList1,
  lazy,
  isWhitespace,
  whitespace,
  whitespace1,
  token,
  digit,
  letter,
  integer,
} from "./combinators.js";
