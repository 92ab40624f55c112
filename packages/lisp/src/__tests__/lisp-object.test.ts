import { describe, it, expect } from "vitest";
import {
  ident,
  str,
  list,
  isIdent,
  isString,
  isList,
  equals,
  depth,
  formatLisp,
  parseLisp,
  type LispObject,
} from "../index.js";

const example: LispObject = list([
  ident("asd"),
  list([str("asdasd"), ident("asd"), list([str("asd")]), ident("asd")]),
  str("asdasd"),
  list([]),
]);

describe("constructors", () => {
  it("build tagged values", () => {
    expect(ident("a")).toEqual({ type: "ident", text: "a" });
    expect(str("a")).toEqual({ type: "string", text: "a" });
    expect(list([ident("a")])).toEqual({ type: "list", items: [{ type: "ident", text: "a" }] });
  });

  it("freeze the tree", () => {
    const l = list([ident("a")]);
    expect(Object.isFrozen(l)).toBe(true);
    expect(Object.isFrozen(l.items)).toBe(true);
    expect(Object.isFrozen(l.items[0])).toBe(true);
  });

  it("copy the items array", () => {
    const items: LispObject[] = [ident("a")];
    const l = list(items);
    items.push(ident("b"));
    expect(l.items).toHaveLength(1);
  });
});

describe("guards", () => {
  it("narrow by variant", () => {
    expect([isIdent(ident("a")), isString(ident("a")), isList(ident("a"))]).toEqual([true, false, false]);
    expect(isString(str("a"))).toBe(true);
    expect(isList(list([]))).toBe(true);
  });
});

describe("equals", () => {
  it("compares structurally", () => {
    const copy = list([
      ident("asd"),
      list([str("asdasd"), ident("asd"), list([str("asd")]), ident("asd")]),
      str("asdasd"),
      list([]),
    ]);
    expect(equals(example, copy)).toBe(true);
  });

  it("distinguishes identifiers from strings with the same text", () => {
    expect(equals(ident("a"), str("a"))).toBe(false);
  });

  it("is sensitive to order and length", () => {
    expect(equals(list([ident("a"), ident("b")]), list([ident("b"), ident("a")]))).toBe(false);
    expect(equals(list([ident("a")]), list([ident("a"), ident("a")]))).toBe(false);
  });
});

describe("depth", () => {
  it("counts list nesting", () => {
    expect(depth(ident("a"))).toBe(0);
    expect(depth(list([]))).toBe(1);
    expect(depth(list([list([])]))).toBe(2);
    expect(depth(example)).toBe(3);
  });
});

describe("formatLisp", () => {
  it("prints atoms", () => {
    expect(formatLisp(ident("a"))).toBe("a");
    expect(formatLisp(str("a b"))).toBe('"a b"');
  });

  it("prints lists with single spaces", () => {
    expect(formatLisp(example)).toBe('(asd ("asdasd" asd ("asd") asd) "asdasd" ())');
  });

  it("prints text that parses back to the same tree", () => {
    const r = parseLisp(formatLisp(example));
    expect(r.ok).toBe(true);
    if (r.ok) expect(equals(r.value, example)).toBe(true);
  });
});
