import { parse, type ParseOutcome } from "@sexpr/parser";
import { lispObject, type LispGrammarOptions } from "./grammar.js";
import type { LispObject } from "./lisp-object.js";

/** Parse one object from `text`; surrounding whitespace is allowed, anything else is not. */
export function parseLisp(text: string, options?: LispGrammarOptions): ParseOutcome<LispObject> {
  return parse(lispObject(options), text);
}

/** Like `parseLisp`, but throws `ParseError` on failure. */
export function parseLispOrThrow(text: string, options?: LispGrammarOptions): LispObject {
  return lispObject(options).parseAll(text);
}
