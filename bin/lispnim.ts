#!/usr/bin/env npx tsx
// bin/lispnim.ts
// lispnim CLI entry point
//
// Run:  npx tsx bin/lispnim.ts <command> [options]

import { executeCli } from "./lispnim-commands";

executeCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
