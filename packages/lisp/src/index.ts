/**
 * @sexpr/lisp
 *
 * S-expression grammar built on @sexpr/parser.
 *
 * ```ts
 * import { parseLisp } from "@sexpr/lisp";
 *
 * parseLisp('(define x "hi")');
 * // → { ok: true, value: list([ident("define"), ident("x"), str("hi")]) }
 * ```
 *
 * @module
 */

export {
  type LispObject,
  type LispIdent,
  type LispString,
  type LispList,
  ident,
  str,
  list,
  isIdent,
  isString,
  isList,
  equals,
  depth,
  formatLisp,
} from "./lisp-object.js";

export {
  type LispGrammarOptions,
  isIdentChar,
  lispIdent,
  lispString,
  lispList,
  lispObject,
} from "./grammar.js";

export { parseLisp, parseLispOrThrow } from "./parse-lisp.js";

// Re-exported so callers can run or extend the grammar without a second import
export { parse, ParseError, type ParseOutcome, type ParseFailure } from "@sexpr/parser";
