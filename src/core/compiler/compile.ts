// src/core/compiler/compile.ts
// Driver: source text -> Nim text, in one parse and one emit

import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { CompileError } from "../../outcome/errors";
import { readSexp } from "../reader";
import { emit, type EmitOptions } from "../emit";

export type CompileOptions = Partial<EmitOptions> & {
  /** Name used in diagnostic spans */
  filename?: string;
};

export type CompileResult =
  | { ok: true; code: string; warnings: Diagnostic[] }
  | { ok: false; diagnostics: Diagnostic[] };

/**
 * Compile the first form of `source` to a Nim expression.
 * Throws ParseError or EmitError; never returns partial output.
 */
export function compile(source: string, options: CompileOptions = {}): string {
  const { filename, ...emitOptions } = options;
  return emit(readSexp(source, filename).node, emitOptions);
}

/** Like {@link compile}, but reports failures and ignored trailing input as diagnostics. */
export function tryCompile(source: string, options: CompileOptions = {}): CompileResult {
  const { filename, ...emitOptions } = options;
  try {
    const read = readSexp(source, filename);
    const code = emit(read.node, emitOptions);
    const warnings: Diagnostic[] = [];
    if (read.trailing) {
      const lines = source.slice(0, read.end).split("\n");
      warnings.push(makeDiagnostic("W0001", undefined, {
        file: filename ?? "<input>",
        startLine: lines.length,
        startCol: lines[lines.length - 1].length + 1,
      }));
    }
    return { ok: true, code, warnings };
  } catch (e) {
    if (e instanceof CompileError) {
      return { ok: false, diagnostics: [e.diagnostic] };
    }
    throw e;
  }
}
