// src/outcome/errors.ts
// Error classes thrown by the compiler core; each carries one diagnostic

import type { Diagnostic } from "./diagnostic";

export class CompileError extends Error {
  constructor(public readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "CompileError";
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

/** Raised by the reader: unbalanced parentheses, unterminated strings, dangling quotes. */
export class ParseError extends CompileError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "ParseError";
  }
}

/** Raised by the emitter when a form has the wrong arity or shape. */
export class EmitError extends CompileError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "EmitError";
  }
}
