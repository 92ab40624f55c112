/**
 * Lisp grammar for @sexpr/lisp
 *
 * Identifiers, double-quoted strings and parenthesized lists, assembled
 * from @sexpr/parser combinators:
 *
 *   object = list | string | ident
 *   list   = '(' ws (object (ws object)*)? ws ')'
 *   string = '"' (!'"' .)* '"'
 *   ident  = (!(ws | '(' | ')' | '"') .)+
 *
 * Choice order puts the structural tokens first; `ident` excludes them, so it
 * never swallows the start of a list or string.
 */

import { config, createLogger } from "@sexpr/core";
import {
  type Parser,
  charMatching,
  choice,
  delimited,
  isWhitespace,
  keepLeft,
  keepRight,
  lazy,
  literal,
  many,
  many1,
  map,
  separatedList,
  whitespace,
} from "@sexpr/parser";
import { ident, list, str, type LispIdent, type LispList, type LispObject, type LispString } from "./lisp-object.js";

const log = createLogger("lisp");

export interface LispGrammarOptions {
  /**
   * Deepest list nesting accepted. A list nested deeper does not match.
   * Defaults to the `maxDepth` config value.
   */
  maxDepth?: number;
}

const STRUCTURAL = '()"';

/** Characters allowed in a bare identifier: anything but whitespace, parentheses and `"`. */
export function isIdentChar(ch: string): boolean {
  return !isWhitespace(ch) && !STRUCTURAL.includes(ch);
}

export function lispIdent(): Parser<LispIdent> {
  return map(many1(charMatching(isIdentChar)), (cs) => ident(cs.join("")));
}

/** A string literal. No escape sequences; an unterminated string does not match. */
export function lispString(): Parser<LispString> {
  const body = many(charMatching((ch) => ch !== '"'));
  return map(delimited(literal('"'), body, literal('"')), (cs) => str(cs.join("")));
}

/** A parenthesized list whose items are parsed by `item`. */
export function lispList(item: Parser<LispObject>): Parser<LispList> {
  const open = keepLeft(literal("("), whitespace());
  const close = keepRight(whitespace(), literal(")"));
  return map(delimited(open, separatedList(item, whitespace()), close), (items) => list(items));
}

/**
 * The grammar's start rule. Returns a new parser value on every call, so it
 * can be embedded in larger grammars.
 */
export function lispObject(options: LispGrammarOptions = {}): Parser<LispObject> {
  const maxDepth = options.maxDepth ?? config.get("maxDepth");
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  log.debug(`building grammar with maxDepth ${maxDepth}`);
  return objectAt(0, maxDepth);
}

// One parser per nesting level; past the limit only atoms are tried.
function objectAt(enclosing: number, maxDepth: number): Parser<LispObject> {
  if (enclosing >= maxDepth) {
    return choice(lispString(), lispIdent());
  }
  const item = lazy(() => objectAt(enclosing + 1, maxDepth));
  return choice(lispList(item), lispString(), lispIdent());
}
