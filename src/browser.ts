/**
 * Browser-compatible entry point for multifind.
 *
 * Excludes the CLI, which reads files through node:fs. Callers load file
 * content themselves and pass it in.
 */

export { PatternCompileError } from "./errors.js";
export type { HostOptions, WireMatchResult } from "./host/adapter.js";
export { searchValues } from "./host/adapter.js";
export { compile, scan, search, searchOrThrow } from "./search/index.js";
export type {
  CompileResult,
  FileInput,
  Matcher,
  MatchResult,
  SearchLogger,
  SearchResult,
} from "./types.js";
