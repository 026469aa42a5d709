// bin/lispnim-commands.ts
// Command execution for the lispnim CLI; returns the process exit status

import * as fs from "fs";
import * as path from "path";
import { parseCliArgs, resolveAction, getHelpText, getVersion, type CliAction } from "./lispnim-cli-lib";
import { loadConfig, validateConfig, type LispnimConfig } from "../src/core/config";
import { tryCompile } from "../src/core/compiler/compile";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { sidecarPath, writeSidecar } from "../src/host/sidecar";
import { hostCommandLine, runHost, HostRunError, type SpawnFn } from "../src/host/hostRunner";
import { startRepl } from "../src/repl/repl";

export type CliIO = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
};

type Ctx = {
  io: CliIO;
  log: Console;
  cwd: string;
  verbose: boolean;
  out?: string;
};

export async function executeCli(argv: string[], io: CliIO): Promise<number> {
  const log = new console.Console({ stdout: io.stdout, stderr: io.stderr });
  const args = parseCliArgs(argv);
  const action = resolveAction(args);

  switch (action.kind) {
    case "help":
      log.log(getHelpText());
      return 0;
    case "version":
      log.log(getVersion());
      return 0;
    case "usage-error":
      log.error(action.message);
      log.log(getHelpText());
      return 1;
  }

  const cwd = io.cwd ?? process.cwd();
  let config: LispnimConfig;
  try {
    config = loadConfig({
      configFile: args.configFile && path.resolve(cwd, args.configFile),
      cwd,
      env: io.env,
    });
  } catch (e) {
    log.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const validation = validateConfig(config);
  for (const err of validation.errors) log.error(`Error: invalid configuration: ${err}`);
  if (!validation.valid) return 1;
  if (args.verbose) {
    for (const warning of validation.warnings) log.error(`Warning: ${warning}`);
  }

  const ctx: Ctx = { io, log, cwd, verbose: args.verbose ?? false, out: args.out };
  try {
    return await dispatch(action, config, ctx);
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    log.error(`Error: ${e.message}`);
    if (ctx.verbose && e.stack) log.error(e.stack);
    return 1;
  }
}

function dispatch(
  action: Exclude<CliAction, { kind: "help" | "version" | "usage-error" }>,
  config: LispnimConfig,
  ctx: Ctx
): Promise<number> {
  switch (action.kind) {
    case "repl":
      return startRepl({ input: ctx.io.stdin, output: ctx.io.stdout, emit: config.emit }).then(() => 0);
    case "eval":
      return Promise.resolve(evalCode(action.code, config, ctx));
    case "compile":
      return Promise.resolve(compileFile(action.file, config, ctx) === null ? 1 : 0);
    case "run":
      return runFile(action.file, config, ctx);
  }
}

function evalCode(code: string, config: LispnimConfig, ctx: Ctx): number {
  const result = tryCompile(code, { ...config.emit, filename: "<eval>" });
  if (!result.ok) {
    for (const d of result.diagnostics) ctx.log.error(formatDiagnostic(d));
    return 1;
  }
  for (const w of result.warnings) ctx.log.error(formatDiagnostic(w));
  ctx.log.log(result.code);
  return 0;
}

/** Returns the sidecar path as the user would type it, or null on failure. */
function compileFile(file: string, config: LispnimConfig, ctx: Ctx): string | null {
  const inputPath = path.resolve(ctx.cwd, file);
  if (!fs.existsSync(inputPath)) {
    ctx.log.error(`Error: file not found: ${file}`);
    return null;
  }

  const outFile = ctx.out ?? sidecarPath(file, config.host.extension);
  if (ctx.verbose) ctx.log.error(`Compiling ${file} -> ${outFile}`);

  const result = writeSidecar(inputPath, config.host.extension, { ...config.emit, filename: file }, path.resolve(ctx.cwd, outFile));
  if (!result.ok) {
    for (const d of result.diagnostics) ctx.log.error(formatDiagnostic(d));
    return null;
  }
  for (const w of result.warnings) ctx.log.error(formatDiagnostic(w));
  ctx.log.log(`Wrote ${outFile}`);
  return outFile;
}

async function runFile(file: string, config: LispnimConfig, ctx: Ctx): Promise<number> {
  const outFile = compileFile(file, config, ctx);
  if (outFile === null) return 1;

  const commandLine = hostCommandLine(outFile, config.host).join(" ");
  if (ctx.verbose) ctx.log.error(`Running: ${commandLine}`);
  try {
    return await runHost(outFile, config.host, { spawn: ctx.io.spawn, cwd: ctx.cwd });
  } catch (e) {
    if (!(e instanceof HostRunError)) throw e;
    ctx.log.error(e.message);
    ctx.log.error(`You can run this yourself: ${commandLine}`);
    return 1;
  }
}
