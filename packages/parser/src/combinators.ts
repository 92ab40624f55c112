/**
 * Parser combinator API for @sexpr/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins.
 *
 * Every parser leaves the cursor where it found it when it fails, so a failed
 * alternative never shows up in the position reported by the parser that
 * combined it. Whitespace is never skipped implicitly; wrap a rule with
 * `whitespace()` or `token()` where it is allowed.
 */

import { createLogger } from "@sexpr/core";
import type { Optional, Parser, ParseOutcome, ParseResult } from "./types.js";
import { GrammarContractError, ParseError } from "./errors.js";

const log = createLogger("parse");

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  const parser: Parser<T> = {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
    parseAll(input: string): T {
      const outcome = parse(parser, input);
      if (!outcome.ok) {
        throw new ParseError(outcome.error.kind);
      }
      return outcome.value;
    },
  };
  return parser;
}

function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

function fail<T>(pos: number): ParseResult<T> {
  return { ok: false, pos };
}

// ---------------------------------------------------------------------------
// Top-level entry point
// ---------------------------------------------------------------------------

/**
 * Run `parser` over the whole of `text`. Whitespace before and after the
 * match is skipped; anything else left over is a `TrailingInput` failure.
 */
export function parse<T>(parser: Parser<T>, text: string): ParseOutcome<T> {
  const r = token(parser).parse(text, 0);
  if (!r.ok) {
    log.debug("grammar did not match");
    return { ok: false, error: { kind: "GrammarMismatch" } };
  }
  if (r.pos !== text.length) {
    log.debug(`matched ${r.pos} of ${text.length} characters, rejecting trailing input`);
    return { ok: false, error: { kind: "TrailingInput" } };
  }
  log.debug(`parsed ${text.length} characters`);
  return { ok: true, value: r.value };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((input, pos) => {
    if (input.startsWith(s, pos)) {
      return ok(s, pos + s.length);
    }
    return fail(pos);
  });
}

/**
 * Match one character (one code point) satisfying `predicate`.
 * Fails at end of input.
 */
export function charMatching(predicate: (ch: string) => boolean): Parser<string> {
  return mkParser((input, pos) => {
    const code = input.codePointAt(pos);
    if (code === undefined) return fail(pos);
    const ch = String.fromCodePoint(code);
    if (!predicate(ch)) return fail(pos);
    return ok(ch, pos + ch.length);
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return charMatching((ch) => ch === c);
}

/** Match a single character in the inclusive range [from, to]. */
export function charRange(from: string, to: string): Parser<string> {
  return charMatching((ch) => ch >= from && ch <= to);
}

/** Match one character from `chars`. `oneOf("")` never matches. */
export function oneOf(chars: string): Parser<string> {
  return charMatching((ch) => chars.includes(ch));
}

/** Match one character that is not in `chars`. */
export function noneOf(chars: string): Parser<string> {
  return charMatching((ch) => !chars.includes(ch));
}

/** Match any single character. */
export function anyChar(): Parser<string> {
  return charMatching(() => true);
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp): Parser<string> {
  const flags = pattern.flags.replace(/[gy]/g, "") + "y";
  return mkParser((input, pos) => {
    const anchored = new RegExp(pattern.source, flags);
    anchored.lastIndex = pos;
    const m = anchored.exec(input);
    if (m) {
      return ok(m[0], pos + m[0].length);
    }
    return fail(pos);
  });
}

/** Match end of input. */
export function eof(): Parser<null> {
  return mkParser((input, pos) => {
    if (pos >= input.length) {
      return ok(null, pos);
    }
    return fail(pos);
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. Either failing fails the whole at the original position. */
export function sequence<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return fail(pos);
    const rb = b.parse(input, ra.pos);
    if (!rb.ok) return fail(pos);
    return ok<[A, B]>([ra.value, rb.value], rb.pos);
  });
}

/** Sequence three parsers. */
export function sequence3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return map(sequence(a, sequence(b, c)), ([va, [vb, vc]]): [A, B, C] => [va, vb, vc]);
}

/** Run `a` then `b`, keeping `a`'s value. */
export function keepLeft<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(sequence(a, b), ([va]) => va);
}

/** Run `a` then `b`, keeping `b`'s value. */
export function keepRight<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map(sequence(a, b), ([, vb]) => vb);
}

/** Parse `inner` between `open` and `close`, returning only the inner result. */
export function delimited<O, T, C>(open: Parser<O>, inner: Parser<T>, close: Parser<C>): Parser<T> {
  return map(sequence3(open, inner, close), ([, value]) => value);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation (PEG): each parser is tried from the same position. */
export function choice<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B>;
export function choice<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<A | B | C>;
export function choice<A, B, C, D>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>
): Parser<A | B | C | D>;
export function choice(...parsers: Parser<unknown>[]): Parser<unknown> {
  return mkParser((input, pos) => {
    for (const p of parsers) {
      const r = p.parse(input, pos);
      if (r.ok) return r;
    }
    return fail(pos);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions. Always succeeds.
 *
 * @throws GrammarContractError if `p` succeeds without consuming input,
 * which would otherwise repeat forever.
 */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) break;
      if (r.pos === cur) {
        throw new GrammarContractError("many: repeated parser matched without consuming input", cur);
      }
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

/** One or more repetitions. Same progress check as `many`. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  return map(sequence(p, many(p)), ([first, rest]) => [first, ...rest]);
}

/**
 * Repeat `p` until `stop` matches at the cursor. `stop` is not consumed.
 * Fails if `p` fails before `stop` is found.
 */
export function until<T, S>(p: Parser<T>, stop: Parser<S>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      if (stop.parse(input, cur).ok) return ok(results, cur);
      const r = p.parse(input, cur);
      if (!r.ok) return fail(pos);
      if (r.pos === cur) {
        throw new GrammarContractError("until: repeated parser matched without consuming input", cur);
      }
      results.push(r.value);
      cur = r.pos;
    }
  });
}

/** Optional: always succeeds, reporting whether `p` matched. */
export function optional<T>(p: Parser<T>): Parser<Optional<T>> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return ok<Optional<T>>({ present: true, value: r.value }, r.pos);
    return ok<Optional<T>>({ present: false }, pos);
  });
}

// ---------------------------------------------------------------------------
// Lookahead / negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeed with null only if `p` fails here. Does not consume input. */
export function not<T>(p: Parser<T>): Parser<null> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (r.ok) return fail(pos);
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return fail(pos);
    return ok(f(r.value), r.pos);
  });
}

/** Choose the next parser from the value of the first. */
export function flatMap<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return mkParser((input, pos) => {
    const ra = p.parse(input, pos);
    if (!ra.ok) return fail(pos);
    const rb = f(ra.value).parse(input, ra.pos);
    if (!rb.ok) return fail(pos);
    return rb;
  });
}

// ---------------------------------------------------------------------------
// Separation combinators
// ---------------------------------------------------------------------------

/** One or more items separated by `sep`. A trailing separator is left unconsumed. */
export function separatedList1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return map(sequence(item, many(keepRight(sep, item))), ([first, rest]) => [first, ...rest]);
}

/** Zero or more items separated by `sep`. */
export function separatedList<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return map(optional(separatedList1(item, sep)), (items) => (items.present ? items.value : []));
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}

// ---------------------------------------------------------------------------
// Whitespace and convenience parsers
// ---------------------------------------------------------------------------

/** Whitespace test used by `whitespace()`: JavaScript's `\s` class. */
export function isWhitespace(ch: string): boolean {
  return /^\s$/.test(ch);
}

/** Skip zero or more whitespace characters. Always succeeds. */
export function whitespace(): Parser<string> {
  return map(many(charMatching(isWhitespace)), (cs) => cs.join(""));
}

/** Match one or more whitespace characters. */
export function whitespace1(): Parser<string> {
  return map(many1(charMatching(isWhitespace)), (cs) => cs.join(""));
}

/** Parse `p` surrounded by optional whitespace. */
export function token<T>(p: Parser<T>): Parser<T> {
  return delimited(whitespace(), p, whitespace());
}

/** Match a single ASCII digit [0-9]. */
export function digit(): Parser<string> {
  return charRange("0", "9");
}

/** Match a single ASCII letter [a-zA-Z]. */
export function letter(): Parser<string> {
  return choice(charRange("a", "z"), charRange("A", "Z"));
}

/**
 * Parse an integer (with optional leading minus). Fails on values outside
 * the safe integer range rather than rounding them.
 */
export function integer(): Parser<number> {
  const digits = sequence(optional(char("-")), many1(digit()));
  return mkParser((input, pos) => {
    const r = digits.parse(input, pos);
    if (!r.ok) return fail(pos);
    const [sign, ds] = r.value;
    const n = parseInt(ds.join(""), 10);
    if (!Number.isSafeInteger(n)) return fail(pos);
    return ok(sign.present ? -n : n, r.pos);
  });
}
