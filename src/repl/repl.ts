// src/repl/repl.ts
// Line-at-a-time REPL: each line is compiled and the Nim text printed

import * as readline from "readline";
import { tryCompile } from "../core/compiler/compile";
import type { EmitOptions } from "../core/emit";
import { parse } from "../core/reader";
import { sexpToString } from "../core/sexp";
import { CompileError } from "../outcome/errors";

export type ReplReply = {
  /** Text to print, if any */
  output?: string;
  /** True when the session should end */
  quit?: boolean;
};

export const REPL_BANNER = "lispnim repl (type Ctrl-D to exit, :help for commands)";

export const REPL_HELP = [
  "  <expr>        compile an expression and print the Nim text",
  "  :ast <expr>   print the parsed tree",
  "  :help, :h     show this help",
  "  :quit, :q     exit",
].join("\n");

/**
 * Handle one input line. Compile errors become output; nothing is thrown
 * for bad input.
 */
export function evalReplLine(line: string, emit: Partial<EmitOptions> = {}): ReplReply {
  const trimmed = line.trim();
  if (trimmed === "") return {};

  if (trimmed.startsWith(":")) {
    const [command] = trimmed.split(/\s/, 1);
    const rest = trimmed.slice(command.length).trim();
    switch (command) {
      case ":quit":
      case ":q":
        return { quit: true };
      case ":help":
      case ":h":
        return { output: REPL_HELP };
      case ":ast":
        return { output: showAst(rest) };
      default:
        return { output: `Unknown command: ${command} (try :help)` };
    }
  }

  const result = tryCompile(trimmed, { ...emit, filename: "<repl>" });
  if (!result.ok) {
    return { output: result.diagnostics.map((d) => `Error: ${d.message}`).join("\n") };
  }
  const warnings = result.warnings.map((w) => `Warning: ${w.message}`);
  return { output: [...warnings, result.code].join("\n") };
}

function showAst(source: string): string {
  try {
    const node = parse(source, "<repl>");
    return node ? sexpToString(node) : "nil";
  } catch (e) {
    if (e instanceof CompileError) return `Error: ${e.message}`;
    throw e;
  }
}

export type ReplOptions = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  emit?: Partial<EmitOptions>;
  prompt?: string;
};

/** Run until end of input or :quit. */
export async function startRepl(options: ReplOptions): Promise<void> {
  const { input, output, emit = {}, prompt = "> " } = options;
  const rl = readline.createInterface({ input, terminal: false });

  output.write(REPL_BANNER + "\n");
  output.write(prompt);

  try {
    for await (const line of rl) {
      const reply = evalReplLine(line, emit);
      if (reply.quit) break;
      if (reply.output !== undefined) output.write(reply.output + "\n");
      output.write(prompt);
    }
  } finally {
    rl.close();
  }
  output.write("\n");
}
