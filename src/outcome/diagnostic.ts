// src/outcome/diagnostic.ts
// Structured diagnostics shared by the reader, the emitter and the CLI

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/**
 * Render a diagnostic on one line, e.g.
 * `error[E0002]: Unbalanced parentheses (at main.lisp:1:1)`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  let out = `${d.severity}[${d.code}]: ${d.message}`;
  const span = d.span;
  if (span && span.startLine !== undefined) {
    const where = [span.file ?? "<input>", span.startLine, span.startCol ?? 1].join(":");
    out += ` (at ${where})`;
  }
  return out;
}
