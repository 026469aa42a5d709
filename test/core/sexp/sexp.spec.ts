// test/core/sexp/sexp.spec.ts
// Tests for the S-expression printer

import { describe, it, expect } from "vitest";
import { sexpToString, quoteString, list, sym, str, int, float, isList, isSymbol } from "../../../src/core/sexp";
import { parse } from "../../../src/core/reader";

describe("sexpToString", () => {
  it("prints atoms", () => {
    expect(sexpToString(sym("x"))).toBe("x");
    expect(sexpToString(int(-3n))).toBe("-3");
    expect(sexpToString(float(2.5))).toBe("2.5");
    expect(sexpToString(str("a\"b"))).toBe(`"a\\"b"`);
  });

  it("prints lists and quote sugar", () => {
    expect(sexpToString(list([sym("f"), list([]), list([sym("quote"), sym("y")])]))).toBe("(f () 'y)");
  });

  it("prints what the reader read", () => {
    const src = `(let ((a 10) (s "hi\\n")) (+ a 1.5))`;
    const node = parse(src);
    expect(node && sexpToString(node)).toBe(src);
  });
});

describe("quoteString", () => {
  it("escapes quotes, backslashes, newlines and tabs only", () => {
    expect(quoteString("a\"b\\c\nd\te\rf")).toBe("\"a\\\"b\\\\c\\nd\\te\rf\"");
  });
});

describe("guards", () => {
  it("narrow by tag", () => {
    expect(isList(list([]))).toBe(true);
    expect(isList(sym("a"))).toBe(false);
    expect(isSymbol(sym("a"))).toBe(true);
    expect(isSymbol(str("a"))).toBe(false);
  });
});
