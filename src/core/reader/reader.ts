// src/core/reader/reader.ts
// Recursive-descent reader: source text -> one S-expression

import { makeDiagnostic, type DiagnosticCode } from "../../outcome/codes";
import type { Span } from "../../outcome/diagnostic";
import { ParseError } from "../../outcome/errors";
import { float, int, list, str, sym, type Sexp } from "../sexp";

export type ReadResult = {
  /** First form in the source, or null when there is nothing to read */
  node: Sexp | null;
  /** Offset just past the first form and the whitespace/comments after it */
  end: number;
  /** True when more input follows the first form */
  trailing: boolean;
};

type Pos = { line: number; col: number };

const WHITESPACE = " \t\n\r";

// Bounds of the target's signed 64-bit int
const INT_MIN = -(1n << 63n);
const INT_MAX = (1n << 63n) - 1n;

/** Lists and quotes deeper than this are rejected before they can exhaust the stack. */
export const MAX_NESTING_DEPTH = 512;

const INT_RE = /^[+-]?[0-9]+$/;
const FLOAT_RE = /^[+-]?([0-9]+\.?[0-9]*|\.[0-9]+)([eE][+-]?[0-9]+)?$/;

/**
 * Classify a bare token: integer if it parses fully as one and fits in 64 bits,
 * otherwise float if it parses as one, otherwise a symbol.
 */
export function classifyToken(token: string): Sexp {
  if (INT_RE.test(token)) {
    const magnitude = BigInt(token.replace(/^[+-]/, ""));
    const value = token.startsWith("-") ? -magnitude : magnitude;
    if (value >= INT_MIN && value <= INT_MAX) return int(value);
  }
  if (FLOAT_RE.test(token)) return float(Number(token));
  return sym(token);
}

export function readSexp(source: string, filename = "<input>"): ReadResult {
  let idx = 0;
  let pos: Pos = { line: 1, col: 1 };
  let depth = 0;

  const eof = () => idx >= source.length;
  const peek = () => source[idx];

  function advance(): string {
    const ch = source[idx++];
    if (ch === "\n") {
      pos = { line: pos.line + 1, col: 1 };
    } else {
      pos = { line: pos.line, col: pos.col + 1 };
    }
    return ch;
  }

  function skipAtmosphere(): void {
    while (!eof()) {
      const ch = peek();
      if (WHITESPACE.includes(ch)) {
        advance();
        continue;
      }
      if (ch === ";") {
        // comment to end of line
        while (!eof() && advance() !== "\n") {
          /* skip */
        }
        continue;
      }
      break;
    }
  }

  function spanFrom(start: Pos): Span {
    return {
      file: filename,
      startLine: start.line,
      startCol: start.col,
      endLine: pos.line,
      endCol: pos.col,
    };
  }

  function fail(code: DiagnosticCode, start: Pos, params?: Record<string, string | number>): never {
    throw new ParseError(makeDiagnostic(code, params, spanFrom(start)));
  }

  function nested(start: Pos, read: (start: Pos) => Sexp): Sexp {
    if (depth >= MAX_NESTING_DEPTH) fail("E0004", start, { limit: MAX_NESTING_DEPTH });
    depth++;
    const node = read(start);
    depth--;
    return node;
  }

  function readList(start: Pos): Sexp {
    advance(); // consume (
    const items: Sexp[] = [];
    while (true) {
      skipAtmosphere();
      if (eof()) fail("E0002", start);
      if (peek() === ")") {
        advance();
        return list(items);
      }
      const child = readForm();
      if (child) items.push(child);
    }
  }

  function readString(start: Pos): Sexp {
    advance(); // consume opening quote
    let value = "";
    while (!eof()) {
      const ch = advance();
      if (ch === `"`) return str(value);
      if (ch !== "\\") {
        value += ch;
        continue;
      }
      if (eof()) break;
      const next = advance();
      switch (next) {
        case "n":
          value += "\n";
          break;
        case "t":
          value += "\t";
          break;
        default:
          // \" and \\ as well as unknown escapes keep the escaped character
          value += next;
      }
    }
    return fail("E0003", start);
  }

  function readQuote(start: Pos): Sexp {
    advance(); // consume '
    const quoted = readForm();
    if (!quoted) return fail("E0001", start, { detail: "quote must be followed by a form" });
    return list([sym("quote"), quoted]);
  }

  function readToken(): Sexp | null {
    let token = "";
    while (!eof()) {
      const ch = peek();
      if (WHITESPACE.includes(ch) || ch === "(" || ch === ")") break;
      token += advance();
    }
    return token.length > 0 ? classifyToken(token) : null;
  }

  function readForm(): Sexp | null {
    skipAtmosphere();
    if (eof()) return null;
    const start = { ...pos };
    const ch = peek();

    if (ch === "(") return nested(start, readList);
    if (ch === `"`) return readString(start);
    if (ch === "'") return nested(start, readQuote);
    return readToken();
  }

  const node = readForm();
  skipAtmosphere();
  return { node, end: idx, trailing: !eof() };
}

/** Read the first form of `source`; anything after it is ignored. */
export function parse(source: string, filename?: string): Sexp | null {
  return readSexp(source, filename).node;
}
