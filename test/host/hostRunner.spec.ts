// test/host/hostRunner.spec.ts
// Tests for the host compiler runner, with a fake spawn

import { describe, it, expect } from "vitest";
import { EventEmitter } from "events";
import type { SpawnOptions } from "child_process";
import { hostCommandLine, runHost, HostRunError, type SpawnFn } from "../../src/host/hostRunner";
import { DEFAULT_HOST_CONFIG } from "../../src/core/config";

type SpawnCall = { command: string; args: string[]; options: SpawnOptions };

function fakeSpawn(outcome: { code: number | null } | { error: Error }) {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new EventEmitter();
    setImmediate(() => {
      if ("error" in outcome) child.emit("error", outcome.error);
      else child.emit("exit", outcome.code);
    });
    return child;
  };
  return { spawn, calls };
}

describe("hostCommandLine", () => {
  it("puts the sidecar after the configured args", () => {
    expect(hostCommandLine("a.nim", DEFAULT_HOST_CONFIG)).toEqual(["nim", "c", "--path:.", "-r", "a.nim"]);
  });
});

describe("runHost", () => {
  it("spawns the host compiler with inherited stdio", async () => {
    const { spawn, calls } = fakeSpawn({ code: 0 });

    await expect(runHost("sq.nim", DEFAULT_HOST_CONFIG, { spawn, cwd: "/work" })).resolves.toBe(0);

    expect(calls).toEqual([
      { command: "nim", args: ["c", "--path:.", "-r", "sq.nim"], options: { stdio: "inherit", cwd: "/work" } },
    ]);
  });

  it("resolves with the child's exit status", async () => {
    const { spawn } = fakeSpawn({ code: 3 });
    await expect(runHost("sq.nim", DEFAULT_HOST_CONFIG, { spawn })).resolves.toBe(3);
  });

  it("treats a signal exit as failure", async () => {
    const { spawn } = fakeSpawn({ code: null });
    await expect(runHost("sq.nim", DEFAULT_HOST_CONFIG, { spawn })).resolves.toBe(1);
  });

  it("rejects when the compiler cannot be started", async () => {
    const { spawn } = fakeSpawn({ error: new Error("spawn nim ENOENT") });
    const run = runHost("sq.nim", DEFAULT_HOST_CONFIG, { spawn });
    await expect(run).rejects.toBeInstanceOf(HostRunError);
    await expect(run).rejects.toThrow("Failed to run nim: spawn nim ENOENT");
  });
});
