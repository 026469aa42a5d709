// test/cli/lispnim.spec.ts
// Tests for the lispnim command line

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { EventEmitter } from "events";
import { parseCliArgs, resolveAction, getHelpText, getVersion } from "../../bin/lispnim-cli-lib";
import { executeCli, type CliIO } from "../../bin/lispnim-commands";
import type { SpawnFn } from "../../src/host/hostRunner";
import { REPL_BANNER } from "../../src/repl/repl";
import { collector, input } from "../helpers/streams";

describe("Command-line argument parsing", () => {
  it("parses a subcommand and its file", () => {
    expect(parseCliArgs(["run", "a.lisp"])).toEqual({ command: "run", file: "a.lisp" });
  });

  it("parses --eval with code", () => {
    expect(parseCliArgs(["-e", "(+ 1 2)"])).toEqual({ command: "eval", code: "(+ 1 2)" });
    expect(parseCliArgs(["eval", "(+ 1 2)"])).toEqual({ command: "eval", code: "(+ 1 2)" });
  });

  it("takes an eval expression that starts with a dash", () => {
    expect(parseCliArgs(["eval", "-5"])).toEqual({ command: "eval", code: "-5" });
    expect(parseCliArgs(["eval", "--verbose", "-5"])).toEqual({ command: "eval", verbose: true, code: "-5" });
  });

  it("parses options anywhere on the line", () => {
    expect(parseCliArgs(["compile", "a.lisp", "-o", "out.nim", "--verbose", "-c", "cfg.json"])).toEqual({
      command: "compile",
      file: "a.lisp",
      out: "out.nim",
      verbose: true,
      configFile: "cfg.json",
    });
  });

  it("parses help and version flags", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--version"]).version).toBe(true);
  });
});

describe("resolveAction", () => {
  it("shows help with no command or with --help", () => {
    expect(resolveAction({})).toEqual({ kind: "help" });
    expect(resolveAction({ help: true, command: "run" })).toEqual({ kind: "help" });
  });

  it("requires a filename for run and compile", () => {
    expect(resolveAction({ command: "run" })).toEqual({ kind: "usage-error", message: "run requires a filename" });
    expect(resolveAction({ command: "compile", file: "x.lisp" })).toEqual({ kind: "compile", file: "x.lisp" });
  });

  it("requires an expression for eval", () => {
    expect(resolveAction({ command: "eval" })).toEqual({ kind: "usage-error", message: "eval requires an expression" });
  });

  it("rejects unknown commands", () => {
    expect(resolveAction({ command: "frobnicate" })).toEqual({
      kind: "usage-error",
      message: "Unknown command: frobnicate",
    });
  });
});

describe("Help and version", () => {
  it("lists every subcommand", () => {
    const help = getHelpText();
    expect(help).toContain("lispnim run <file>");
    expect(help).toContain("lispnim compile <file>");
    expect(help).toContain("lispnim repl");
    expect(help).toContain("--help");
  });

  it("reports the package version", () => {
    expect(getVersion()).toMatch(/^lispnim v\d+\.\d+\.\d+$/);
  });
});

describe("executeCli", () => {
  let dir: string;
  let stdout: ReturnType<typeof collector>;
  let stderr: ReturnType<typeof collector>;

  function io(extra: Partial<CliIO> = {}): CliIO {
    return { stdin: input(""), stdout: stdout.stream, stderr: stderr.stream, cwd: dir, env: {}, ...extra };
  }

  function fakeSpawn(outcome: { code: number } | { error: Error }) {
    const calls: Array<{ command: string; args: string[]; cwd?: string }> = [];
    const spawn: SpawnFn = (command, args, options) => {
      calls.push({ command, args, cwd: options.cwd?.toString() });
      const child = new EventEmitter();
      setImmediate(() => {
        if ("error" in outcome) child.emit("error", outcome.error);
        else child.emit("exit", outcome.code);
      });
      return child;
    };
    return { spawn, calls };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lispnim-cli-"));
    fs.writeFileSync(path.join(dir, "sq.lisp"), "(lambda ((x int)) (* x x))\n");
    stdout = collector();
    stderr = collector();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("prints usage with no arguments", async () => {
    expect(await executeCli([], io())).toBe(0);
    expect(stdout.text()).toBe(getHelpText() + "\n");
  });

  it("prints usage and fails on an unknown command", async () => {
    expect(await executeCli(["bogus"], io())).toBe(1);
    expect(stderr.text()).toBe("Unknown command: bogus\n");
    expect(stdout.text()).toBe(getHelpText() + "\n");
  });

  it("evaluates an expression to Nim", async () => {
    expect(await executeCli(["eval", "(+ 1 2)"], io())).toBe(0);
    expect(stdout.text()).toBe("(1 + 2)\n");
  });

  it("reports compile errors as diagnostics", async () => {
    expect(await executeCli(["-e", "(if 1 2)"], io())).toBe(1);
    expect(stderr.text()).toBe("error[E0101]: if requires 3 arguments: condition, then, else\n");
    expect(stdout.text()).toBe("");
  });

  it("compiles a file to its sidecar", async () => {
    expect(await executeCli(["compile", "sq.lisp"], io())).toBe(0);
    expect(stdout.text()).toBe("Wrote sq.nim\n");
    expect(fs.readFileSync(path.join(dir, "sq.nim"), "utf8")).toBe("(proc(x: int): auto = return (x * x))\n");
  });

  it("writes to --out when given", async () => {
    expect(await executeCli(["compile", "sq.lisp", "-o", "build.nim"], io())).toBe(0);
    expect(stdout.text()).toBe("Wrote build.nim\n");
    expect(fs.existsSync(path.join(dir, "build.nim"))).toBe(true);
  });

  it("fails on a missing input file", async () => {
    expect(await executeCli(["compile", "missing.lisp"], io())).toBe(1);
    expect(stderr.text()).toBe("Error: file not found: missing.lisp\n");
  });

  it("fails without writing a sidecar when the input does not compile", async () => {
    fs.writeFileSync(path.join(dir, "bad.lisp"), "(let x 1)");
    expect(await executeCli(["compile", "bad.lisp"], io())).toBe(1);
    expect(stderr.text()).toBe("error[E0102]: let bindings must be a list\n");
    expect(fs.existsSync(path.join(dir, "bad.nim"))).toBe(false);
  });

  it("runs the host compiler on the sidecar", async () => {
    const { spawn, calls } = fakeSpawn({ code: 0 });
    expect(await executeCli(["run", "sq.lisp"], io({ spawn }))).toBe(0);
    expect(stdout.text()).toBe("Wrote sq.nim\n");
    expect(calls).toEqual([{ command: "nim", args: ["c", "--path:.", "-r", "sq.nim"], cwd: dir }]);
  });

  it("passes the host compiler's exit status through", async () => {
    const { spawn } = fakeSpawn({ code: 3 });
    expect(await executeCli(["run", "sq.lisp"], io({ spawn }))).toBe(3);
  });

  it("explains how to run the sidecar by hand when the host compiler is missing", async () => {
    const { spawn } = fakeSpawn({ error: new Error("spawn nim ENOENT") });
    expect(await executeCli(["run", "sq.lisp"], io({ spawn }))).toBe(1);
    expect(stderr.text()).toBe(
      "Failed to run nim: spawn nim ENOENT\nYou can run this yourself: nim c --path:. -r sq.nim\n"
    );
  });

  it("takes settings from the environment", async () => {
    expect(await executeCli(["compile", "sq.lisp"], io({ env: { LISPNIM_EXTENSION: ".nims" } }))).toBe(0);
    expect(stdout.text()).toBe("Wrote sq.nims\n");
  });

  it("rejects an invalid configuration", async () => {
    expect(await executeCli(["compile", "sq.lisp"], io({ env: { LISPNIM_EXTENSION: "nims" } }))).toBe(1);
    expect(stderr.text()).toBe('Error: invalid configuration: host extension must look like ".nim", got: "nims"\n');
  });

  it("reports a missing config file", async () => {
    expect(await executeCli(["-c", "nope.json", "eval", "1"], io())).toBe(1);
    expect(stderr.text()).toBe(`Error: Config file not found: ${path.join(dir, "nope.json")}\n`);
  });

  it("runs the REPL over stdin", async () => {
    expect(await executeCli(["repl"], io({ stdin: input("(car xs)\n") }))).toBe(0);
    expect(stdout.text()).toBe(`${REPL_BANNER}\n> xs[0]\n> \n`);
  });
});
