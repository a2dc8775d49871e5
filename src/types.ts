import type { PatternCompileError } from "./errors.js";
import type { RegexMatch } from "./regex/index.js";

/** One logical file to search. Owned by the caller and never mutated. */
export interface FileInput {
  /** Opaque identifier, copied verbatim into every match */
  path: string;
  /** Full text of the file; may be empty */
  content: string;
}

/** One match occurrence. */
export interface MatchResult {
  /** Copied from the owning FileInput */
  path: string;
  /** 1-based line number */
  line: number;
  /** 1-based column of the match start, counted in code points */
  column: number;
  /** Full text of the matching line, without its terminator */
  lineText: string;
}

/**
 * A compiled pattern, ready to be run against any number of lines.
 * Immutable, so a single matcher may serve concurrent scans.
 */
export interface Matcher {
  readonly pattern: string;
  readonly caseSensitive: boolean;
  /** Yield every non-overlapping match in `line`, left to right */
  findAll(line: string): IterableIterator<RegexMatch>;
}

export type CompileResult =
  | { ok: true; matcher: Matcher }
  | { ok: false; error: PatternCompileError };

export type SearchResult =
  | { ok: true; matches: MatchResult[] }
  | { ok: false; error: PatternCompileError };

/**
 * Logger interface for hosting layers.
 * The search core never logs; adapters and the CLI report through this.
 */
export interface SearchLogger {
  /** Log informational messages (calls, counts) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (per-file detail) */
  debug(message: string, data?: Record<string, unknown>): void;
}
