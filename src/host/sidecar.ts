// src/host/sidecar.ts
// Sidecar files: the generated Nim source written next to its input

import * as fs from "fs";
import * as path from "path";
import { tryCompile, type CompileOptions } from "../core/compiler/compile";
import type { Diagnostic } from "../outcome/diagnostic";

/** Same directory and base name as `inputFile`, with `extension` in place of its own. */
export function sidecarPath(inputFile: string, extension: string): string {
  const { dir, name } = path.parse(inputFile);
  return path.join(dir, name + extension);
}

export type SidecarResult =
  | { ok: true; outFile: string; warnings: Diagnostic[] }
  | { ok: false; diagnostics: Diagnostic[] };

/**
 * Compile `inputFile` and write the result to its sidecar (or `outFile`).
 * Nothing is written when compilation fails.
 */
export function writeSidecar(
  inputFile: string,
  extension: string,
  options: CompileOptions = {},
  outFile = sidecarPath(inputFile, extension)
): SidecarResult {
  if (path.resolve(outFile) === path.resolve(inputFile)) {
    throw new Error(`Refusing to overwrite the input file: ${inputFile}`);
  }
  const source = fs.readFileSync(inputFile, "utf8");
  const result = tryCompile(source, { ...options, filename: options.filename ?? inputFile });
  if (!result.ok) return result;

  fs.writeFileSync(outFile, result.code + "\n", "utf8");
  return { ok: true, outFile, warnings: result.warnings };
}
