// src/index.ts
// lispnim - Public API
//
// compile() is the entry point; the CLI, REPL and host runner are built on it.

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER
// ═══════════════════════════════════════════════════════════════════════════════

export { compile, tryCompile, type CompileOptions, type CompileResult } from "./core/compiler/compile";

export { readSexp, parse, classifyToken, MAX_NESTING_DEPTH, type ReadResult } from "./core/reader";

export {
  emit,
  formatFloat,
  isOperatorLike,
  isSpecialForm,
  DEFAULT_EMIT_OPTIONS,
  type EmitOptions,
  type DoReturnStyle,
} from "./core/emit";

export {
  list,
  sym,
  str,
  int,
  float,
  isList,
  isSymbol,
  quoteString,
  sexpToString,
  type Sexp,
  type SexpTag,
  type SexpOf,
} from "./core/sexp";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export { CompileError, ParseError, EmitError } from "./outcome/errors";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { formatDiagnostic, type Diagnostic, type DiagnosticSeverity, type Span } from "./outcome/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION AND HOST
// ═══════════════════════════════════════════════════════════════════════════════

export {
  loadConfig,
  mergeConfigs,
  validateConfig,
  DEFAULT_CONFIG,
  type LispnimConfig,
  type HostConfig,
  type ConfigLayer,
} from "./core/config";

export { sidecarPath, writeSidecar, type SidecarResult } from "./host/sidecar";
export { runHost, hostCommandLine, HostRunError, type SpawnFn } from "./host/hostRunner";
export { startRepl, evalReplLine, type ReplOptions, type ReplReply } from "./repl/repl";
