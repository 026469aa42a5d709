// src/core/sexp/index.ts
// S-expression utilities

export {
  type Sexp,
  type SexpTag,
  type SexpOf,
  list,
  sym,
  str,
  int,
  float,
  isList,
  isSymbol,
  quoteString,
  sexpToString,
} from "./sexp";
