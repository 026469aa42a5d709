// bin/lispnim-cli-lib.ts
// Argument parsing, help and version for the lispnim command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  /** First positional argument */
  command?: string;
  /** Second positional argument */
  file?: string;
  /** Expression given to eval / --eval */
  code?: string;
  /** --out: sidecar path override */
  out?: string;
  /** --config: config file */
  configFile?: string;
};

export type CliAction =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "repl" }
  | { kind: "compile"; file: string }
  | { kind: "run"; file: string }
  | { kind: "eval"; code: string }
  | { kind: "usage-error"; message: string };

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.command = "eval";
      result.code = args[++i] ?? "";
    } else if (arg === "--out" || arg === "-o") {
      result.out = args[++i];
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = args[++i];
    } else if (result.command === "eval" && result.code === undefined) {
      // eval takes its expression verbatim, so `eval -5` reads -5
      result.code = arg;
    } else if (!arg.startsWith("-")) {
      if (result.command === undefined) {
        result.command = arg;
      } else if (result.file === undefined) {
        result.file = arg;
      }
    }
    // Ignore unknown flags
  }

  return result;
}

/** Decide what to do; usage problems become a usage-error action. */
export function resolveAction(args: CliArgs): CliAction {
  if (args.help) return { kind: "help" };
  if (args.version) return { kind: "version" };

  switch (args.command) {
    case undefined:
      return { kind: "help" };
    case "run":
    case "compile":
      if (!args.file) {
        return { kind: "usage-error", message: `${args.command} requires a filename` };
      }
      return args.command === "run"
        ? { kind: "run", file: args.file }
        : { kind: "compile", file: args.file };
    case "repl":
      return { kind: "repl" };
    case "eval":
      if (!args.code) {
        return { kind: "usage-error", message: "eval requires an expression" };
      }
      return { kind: "eval", code: args.code };
    default:
      return { kind: "usage-error", message: `Unknown command: ${args.command}` };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
lispnim - compile Lisp-like expressions to Nim

USAGE:
  lispnim run <file>                  Compile, write the .nim sidecar, then build and run it with nim
  lispnim compile <file>              Compile and write the .nim sidecar only
  lispnim eval <code>                 Compile an expression and print the Nim text
  lispnim repl                        Interactive REPL (prints generated Nim)

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Same as the eval command
  -o, --out <file>                   Write the sidecar to <file>
  -c, --config <file>                Load configuration from <file> (.json, .yaml)
  --verbose                          Show progress and stack traces

REPL COMMANDS:
  :ast <expr>                        Print the parsed tree
  :help, :h                          Show REPL help
  :quit, :q                          Exit the REPL

EXAMPLES:
  lispnim eval "(+ 1 2)"             # prints (1 + 2)
  lispnim compile square.lisp        # writes square.nim
  lispnim run square.lisp            # writes square.nim, runs nim c --path:. -r square.nim
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

const FALLBACK_VERSION = "lispnim v0.1.0";

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `lispnim v${pkg.version}`;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}
