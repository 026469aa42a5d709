// test/helpers/streams.ts
// In-memory stdio for REPL and CLI tests

import { Readable, Writable } from "stream";

export function input(text: string): Readable {
  return Readable.from([text]);
}

export function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}
