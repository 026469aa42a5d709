// src/core/sexp/sexp.ts
// S-expression tree produced by the reader and consumed by the emitter

export type Sexp =
  | { tag: "List"; items: Sexp[] }
  | { tag: "Symbol"; name: string }
  | { tag: "String"; value: string }
  | { tag: "Int"; value: bigint }
  | { tag: "Float"; value: number };

export type SexpTag = Sexp["tag"];

/** Narrow a node to one variant by tag. */
export type SexpOf<T extends SexpTag> = Extract<Sexp, { tag: T }>;

export function list(items: Sexp[]): Sexp { return { tag: "List", items }; }
export function sym(name: string): Sexp { return { tag: "Symbol", name }; }
export function str(value: string): Sexp { return { tag: "String", value }; }
export function int(value: bigint): Sexp { return { tag: "Int", value }; }
export function float(value: number): Sexp { return { tag: "Float", value }; }

export function isList(x: Sexp): x is SexpOf<"List"> { return x.tag === "List"; }
export function isSymbol(x: Sexp): x is SexpOf<"Symbol"> { return x.tag === "Symbol"; }

/**
 * Quote a string with the escape set the reader understands:
 * backslash, double quote, newline and tab.
 */
export function quoteString(s: string): string {
  let out = "\"";
  for (const ch of s) {
    switch (ch) {
      case "\"": out += "\\\""; break;
      case "\\": out += "\\\\"; break;
      case "\n": out += "\\n"; break;
      case "\t": out += "\\t"; break;
      default: out += ch;
    }
  }
  return out + "\"";
}

/** Print a tree back in surface syntax. */
export function sexpToString(x: Sexp): string {
  switch (x.tag) {
    case "Symbol": return x.name;
    case "String": return quoteString(x.value);
    case "Int": return x.value.toString();
    case "Float": return String(x.value);
    case "List": {
      if (x.items.length === 2) {
        const [head, arg] = x.items;
        if (head.tag === "Symbol" && head.name === "quote") return `'${sexpToString(arg)}`;
      }
      return `(${x.items.map(sexpToString).join(" ")})`;
    }
  }
}
