// src/core/emit/nim.ts
// Code generator: S-expression -> Nim expression text

import { makeDiagnostic } from "../../outcome/codes";
import { EmitError } from "../../outcome/errors";
import { isList, isSymbol, quoteString, type Sexp, type SexpOf } from "../sexp";

// ─────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────

/**
 * How a `do` block yields its last operand:
 * - explicit: the last operand is emitted as `return <expr>`
 * - implicit: the block is a bare statement list and relies on Nim's
 *   last-expression value
 */
export type DoReturnStyle = "explicit" | "implicit";

export type EmitOptions = {
  /** Indentation of the body lines of an immediately-invoked block */
  indent: string;
  doReturn: DoReturnStyle;
};

export const DEFAULT_EMIT_OPTIONS: EmitOptions = {
  indent: "  ",
  doReturn: "explicit",
};

type SpecialForm = (args: Sexp[], opts: EmitOptions) => string;

// ─────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────

export function emit(node: Sexp | null, options: Partial<EmitOptions> = {}): string {
  return emitExpr(node, { ...DEFAULT_EMIT_OPTIONS, ...options });
}

/** A symbol is operator-like when it has any character outside [A-Za-z0-9_]. */
export function isOperatorLike(name: string): boolean {
  return /[^A-Za-z0-9_]/.test(name);
}

function emitExpr(node: Sexp | null, opts: EmitOptions): string {
  if (!node) return "nil";
  switch (node.tag) {
    case "Symbol": return node.name;
    case "String": return quoteString(node.value);
    case "Int": return node.value.toString();
    case "Float": return formatFloat(node.value);
    case "List": return emitList(node, opts);
  }
}

function emitList(form: SexpOf<"List">, opts: EmitOptions): string {
  if (form.items.length === 0) return "nil";
  const [head, ...args] = form.items;
  if (!isSymbol(head)) {
    throw new EmitError(makeDiagnostic("E0100"));
  }
  const special = SPECIAL_FORMS.get(head.name);
  if (special) return special(args, opts);
  return emitCall(head.name, args, opts);
}

function emitCall(op: string, args: Sexp[], opts: EmitOptions): string {
  const operands = args.map((a) => emitExpr(a, opts));
  const operatorLike = isOperatorLike(op);
  if (operatorLike && operands.length === 2) {
    return `(${operands[0]} ${op} ${operands[1]})`;
  }
  const callee = operatorLike ? `(${op})` : op;
  return `${callee}(${operands.join(", ")})`;
}

// ─────────────────────────────────────────────────────────────────
// Literals and layout
// ─────────────────────────────────────────────────────────────────

/** Decimal text that Nim still reads as a float literal. */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return value > 0 ? "Inf" : "-Inf";
  }
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

function indentLines(text: string, indent: string): string {
  return text
    .split("\n")
    .map((line) => indent + line)
    .join("\n");
}

/** Immediately-invoked anonymous proc, so a statement list can sit in expression position. */
function block(statements: string[], opts: EmitOptions): string {
  const body = statements.map((s) => indentLines(s, opts.indent)).join("\n");
  return `((proc(): auto =\n${body}\n)())`;
}

// ─────────────────────────────────────────────────────────────────
// Shape checks
// ─────────────────────────────────────────────────────────────────

function expectArity(form: string, args: Sexp[], count: number, expected: string): void {
  if (args.length !== count) {
    throw new EmitError(makeDiagnostic("E0101", { form, expected, actual: args.length }));
  }
}

function expectList(node: Sexp, form: string, part: string): SexpOf<"List"> {
  if (!isList(node)) {
    throw new EmitError(makeDiagnostic("E0102", { form, part }));
  }
  return node;
}

function expectPair(node: Sexp, subject: string, shape: string): [Sexp, Sexp] {
  if (!isList(node) || node.items.length !== 2) {
    throw new EmitError(makeDiagnostic("E0103", { subject, shape }));
  }
  const [first, second] = node.items;
  return [first, second];
}

// ─────────────────────────────────────────────────────────────────
// Special forms
// ─────────────────────────────────────────────────────────────────

function emitIf(args: Sexp[], opts: EmitOptions): string {
  expectArity("if", args, 3, "3 arguments: condition, then, else");
  const [cond, thenB, elseB] = args.map((a) => emitExpr(a, opts));
  return `(if ${cond}: ${thenB} else: ${elseB})`;
}

function emitLet(args: Sexp[], opts: EmitOptions): string {
  expectArity("let", args, 2, "2 arguments: bindings and body");
  const [bindings, body] = args;
  const statements = expectList(bindings, "let", "bindings").items.map((binding) => {
    const [name, value] = expectPair(binding, "each binding", "(name value)");
    if (!isSymbol(name)) {
      throw new EmitError(makeDiagnostic("E0104", { subject: "binding name", what: "a symbol" }));
    }
    return `let ${name.name} = ${emitExpr(value, opts)}`;
  });
  statements.push(`return ${emitExpr(body, opts)}`);
  return block(statements, opts);
}

function emitLambda(args: Sexp[], opts: EmitOptions): string {
  expectArity("lambda", args, 2, "2 arguments: params and body");
  const [params, body] = args;
  const formals = expectList(params, "lambda", "params").items.map((param) => {
    const [name, type] = expectPair(param, "lambda param", "(name type)");
    if (!isSymbol(name) || !isSymbol(type)) {
      throw new EmitError(makeDiagnostic("E0104", { subject: "lambda param name and type", what: "symbols" }));
    }
    return `${name.name}: ${type.name}`;
  });
  return `(proc(${formals.join(", ")}): auto = return ${emitExpr(body, opts)})`;
}

function emitDo(args: Sexp[], opts: EmitOptions): string {
  if (args.length === 0) return "nil";
  const statements = args.map((a) => emitExpr(a, opts));
  if (opts.doReturn === "explicit") {
    const last = statements.length - 1;
    statements[last] = `return ${statements[last]}`;
  }
  return block(statements, opts);
}

function emitCar(args: Sexp[], opts: EmitOptions): string {
  expectArity("car", args, 1, "1 argument: a list");
  return `${emitExpr(args[0], opts)}[0]`;
}

function emitCdr(args: Sexp[], opts: EmitOptions): string {
  expectArity("cdr", args, 1, "1 argument: a list");
  return `${emitExpr(args[0], opts)}[1..^1]`;
}

function emitCons(args: Sexp[], opts: EmitOptions): string {
  expectArity("cons", args, 2, "2 arguments: an element and a list");
  const [elem, rest] = args.map((a) => emitExpr(a, opts));
  return `(@[${elem}] & ${rest})`;
}

// '(a b c) is a seq literal; a quoted atom is the atom itself
function emitQuote(args: Sexp[], opts: EmitOptions): string {
  expectArity("quote", args, 1, "1 argument: a form");
  const [datum] = args;
  if (!isList(datum)) return emitExpr(datum, opts);
  return `@[${datum.items.map((item) => emitExpr(item, opts)).join(", ")}]`;
}

const SPECIAL_FORMS = new Map<string, SpecialForm>([
  ["if", emitIf],
  ["let", emitLet],
  ["lambda", emitLambda],
  ["do", emitDo],
  ["car", emitCar],
  ["cdr", emitCdr],
  ["cons", emitCons],
  ["quote", emitQuote],
]);

export function isSpecialForm(name: string): boolean {
  return SPECIAL_FORMS.has(name);
}
