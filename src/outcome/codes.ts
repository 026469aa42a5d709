// src/outcome/codes.ts
// Diagnostic code table: every error the compiler can report has one entry here

import { errorDiag, warnDiag, type Diagnostic, type DiagnosticSeverity, type Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced parentheses" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Invalid string literal: unterminated" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Expression nested too deeply (limit {limit})" },

  E0100: { code: "E0100", severity: "error", category: "Emit", template: "operator must be a symbol" },
  E0101: { code: "E0101", severity: "error", category: "Emit", template: "{form} requires {expected}" },
  E0102: { code: "E0102", severity: "error", category: "Emit", template: "{form} {part} must be a list" },
  E0103: { code: "E0103", severity: "error", category: "Emit", template: "{subject} must be {shape}" },
  E0104: { code: "E0104", severity: "error", category: "Emit", template: "{subject} must be {what}" },

  W0001: { code: "W0001", severity: "warning", category: "Syntax", template: "Trailing input ignored after the first form" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const opts: Pick<Diagnostic, "span" | "data"> = {};
  if (span) opts.span = span;
  if (params) opts.data = { ...params };
  return def.severity === "error"
    ? errorDiag(def.code, message, opts)
    : warnDiag(def.code, message, opts);
}
