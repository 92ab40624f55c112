/**
 * The tree produced by the Lisp grammar.
 *
 * A `LispObject` is an identifier, a string literal or a list of objects.
 * Each list owns its items; trees are frozen on construction.
 */

export type LispObject = LispIdent | LispString | LispList;

export interface LispIdent {
  readonly type: "ident";
  readonly text: string;
}

export interface LispString {
  readonly type: "string";
  readonly text: string;
}

export interface LispList {
  readonly type: "list";
  readonly items: readonly LispObject[];
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function ident(text: string): LispIdent {
  const obj: LispIdent = { type: "ident", text };
  return Object.freeze(obj);
}

export function str(text: string): LispString {
  const obj: LispString = { type: "string", text };
  return Object.freeze(obj);
}

/** Build a list. The items array is copied, so later changes to it are not seen. */
export function list(items: readonly LispObject[]): LispList {
  const obj: LispList = { type: "list", items: Object.freeze([...items]) };
  return Object.freeze(obj);
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isIdent(obj: LispObject): obj is LispIdent {
  return obj.type === "ident";
}

export function isString(obj: LispObject): obj is LispString {
  return obj.type === "string";
}

export function isList(obj: LispObject): obj is LispList {
  return obj.type === "list";
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

/** Structural equality. */
export function equals(a: LispObject, b: LispObject): boolean {
  switch (a.type) {
    case "ident":
    case "string":
      return b.type === a.type && b.text === a.text;
    case "list":
      return (
        b.type === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => equals(item, b.items[i]))
      );
  }
}

/** List nesting depth: atoms are 0, `()` is 1, `(())` is 2. */
export function depth(obj: LispObject): number {
  if (obj.type !== "list") return 0;
  return 1 + obj.items.reduce((max, item) => Math.max(max, depth(item)), 0);
}

/**
 * Print a tree as source text. Items are separated by one space, so
 * `formatLisp(list([ident("a"), str("b")]))` is `(a "b")`.
 */
export function formatLisp(obj: LispObject): string {
  switch (obj.type) {
    case "ident":
      return obj.text;
    case "string":
      return `"${obj.text}"`;
    case "list":
      return `(${obj.items.map(formatLisp).join(" ")})`;
  }
}
