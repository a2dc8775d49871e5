import { PatternCompileError } from "../errors.js";
import { createUserRegex } from "../regex/index.js";
import type { CompileResult, Matcher } from "../types.js";

/**
 * Compile a user pattern into a Matcher.
 *
 * Case-insensitivity is a compile-time flag; the pattern text is never
 * rewritten. The empty pattern is valid and matches at every position.
 * A syntax error is returned, not thrown.
 */
export function compile(pattern: string, caseSensitive: boolean): CompileResult {
  try {
    const regex = createUserRegex(pattern, !caseSensitive);
    const matcher: Matcher = Object.freeze({
      pattern,
      caseSensitive,
      findAll: (line: string) => regex.matchAll(line),
    });
    return { ok: true, matcher };
  } catch (e) {
    if (e instanceof PatternCompileError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
