import type { FileInput, MatchResult, SearchResult } from "../types.js";
import { compile } from "./compile.js";
import { scan } from "./scan.js";

/**
 * Search every file for a pattern.
 *
 * The pattern is compiled once and shared by all files. If it does not
 * compile, the error is returned as-is and no file is scanned.
 *
 * @example
 * const result = search("fo+", [{ path: "a.txt", content: "foo\nbar" }]);
 * if (result.ok) {
 *   // [{ path: "a.txt", line: 1, column: 1, lineText: "foo" }]
 *   console.log(result.matches);
 * }
 */
export function search(
  pattern: string,
  files: readonly FileInput[],
  caseSensitive = true,
): SearchResult {
  const compiled = compile(pattern, caseSensitive);
  if (!compiled.ok) {
    return compiled;
  }
  return { ok: true, matches: scan(compiled.matcher, files) };
}

/**
 * Like search(), but throws the PatternCompileError instead of returning it.
 */
export function searchOrThrow(
  pattern: string,
  files: readonly FileInput[],
  caseSensitive = true,
): MatchResult[] {
  const result = search(pattern, files, caseSensitive);
  if (!result.ok) {
    throw result.error;
  }
  return result.matches;
}
