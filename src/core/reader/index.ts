// src/core/reader/index.ts
export { type ReadResult, readSexp, parse, classifyToken, MAX_NESTING_DEPTH } from "./reader";
