// src/host/hostRunner.ts
// Runs the host compiler on a sidecar file as a child process

import { spawn, type SpawnOptions } from "child_process";
import type { EventEmitter } from "events";
import type { HostConfig } from "../core/config";

/** The part of child_process.spawn the runner needs; tests pass a fake. */
export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => EventEmitter;

export const nodeSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export class HostRunError extends Error {
  constructor(message: string, public readonly command: string) {
    super(message);
    this.name = "HostRunError";
  }
}

export function hostCommandLine(file: string, host: HostConfig): string[] {
  return [host.command, ...host.args, file];
}

/**
 * Spawn the host compiler with inherited stdio so its output reaches the user,
 * and resolve with its exit status (1 when it was killed by a signal).
 */
export function runHost(
  file: string,
  host: HostConfig,
  options: { spawn?: SpawnFn; cwd?: string } = {}
): Promise<number> {
  const { spawn: spawnFn = nodeSpawn, cwd } = options;
  const [command, ...args] = hostCommandLine(file, host);
  return new Promise((resolve, reject) => {
    const child = spawnFn(command, args, { stdio: "inherit", cwd });
    child.on("exit", (code: number | null) => {
      resolve(code ?? 1);
    });
    child.on("error", (err: Error) => {
      reject(new HostRunError(`Failed to run ${command}: ${err.message}`, command));
    });
  });
}
