export { PatternCompileError } from "./errors.js";
export type { HostOptions, WireMatchResult } from "./host/adapter.js";
export { searchValues, toWire } from "./host/adapter.js";
export type { ResolvedSearchOptions, SearchOptions } from "./options.js";
export { resolveSearchOptions } from "./options.js";
export type { RegexMatch } from "./regex/index.js";
export {
  compile,
  scan,
  search,
  searchOrThrow,
  splitLines,
} from "./search/index.js";
export type {
  CompileResult,
  FileInput,
  Matcher,
  MatchResult,
  SearchLogger,
  SearchResult,
} from "./types.js";
