/**
 * UserRegex - regex handling for user-provided patterns
 *
 * Wraps RE2JS so every user pattern is matched in linear time with
 * leftmost-first semantics. Patterns are written in JavaScript regex syntax
 * and translated to RE2 syntax before compiling.
 */

import { RE2JS, RE2JSSyntaxException } from "re2js";
import { PatternCompileError } from "../errors.js";

/**
 * A single match within an input string.
 * Offsets are UTF-16 code unit indices, like String.prototype.slice takes.
 */
export interface RegexMatch {
  start: number;
  end: number;
  text: string;
}

/**
 * Explain syntax RE2 rejects on purpose, so the user knows rewording the
 * pattern will not help.
 */
function explainUnsupported(pattern: string, msg: string): string {
  if (
    msg.includes("(?=") ||
    msg.includes("(?!") ||
    msg.includes("(?<") ||
    pattern.includes("(?=") ||
    pattern.includes("(?!") ||
    pattern.includes("(?<=") ||
    pattern.includes("(?<!")
  ) {
    return " (lookahead and lookbehind assertions are not supported: patterns are matched in linear time)";
  }
  if (msg.includes("backreference") || /\\[1-9]/.test(pattern)) {
    return " (backreferences are not supported: patterns are matched in linear time)";
  }
  return "";
}

/**
 * Width in UTF-16 code units of the code point starting at `index`.
 * Used to step past zero-length matches without splitting a surrogate pair.
 */
function codePointWidthAt(input: string, index: number): number {
  const cp = input.codePointAt(index);
  return cp !== undefined && cp > 0xffff ? 2 : 1;
}

/**
 * A compiled user pattern. Instances are immutable: matching state lives in
 * a fresh RE2JS matcher per call, so one UserRegex may be shared freely.
 */
export class UserRegex {
  private readonly _re2: RE2JS;

  constructor(pattern: string, ignoreCase = false) {
    try {
      this._re2 = RE2JS.compile(
        RE2JS.translateRegExp(pattern),
        ignoreCase ? RE2JS.CASE_INSENSITIVE : 0,
      );
    } catch (e) {
      if (e instanceof RE2JSSyntaxException) {
        const msg = e.message || "syntax error";
        throw new PatternCompileError(
          pattern,
          msg,
          explainUnsupported(pattern, msg),
        );
      }
      throw e;
    }
  }

  /**
   * Iterate over all non-overlapping matches from left to right.
   *
   * After a zero-length match the scan resumes one code point further on,
   * so the empty pattern matches at every code point boundary. An empty
   * match that starts exactly where the previous match ended is skipped:
   * `a*` on "aab" yields "aa" at 0 and "" at 3, not an extra "" at 2.
   */
  *matchAll(input: string): IterableIterator<RegexMatch> {
    const matcher = this._re2.matcher(input);
    let pos = 0;
    let lastEnd = -1;

    while (pos <= input.length && matcher.find(pos)) {
      const start = matcher.start(0);
      const end = matcher.end(0);

      if (start === end && start === lastEnd) {
        pos = start + codePointWidthAt(input, start);
        continue;
      }

      yield { start, end, text: matcher.group(0) ?? "" };

      lastEnd = end;
      pos = start === end ? end + codePointWidthAt(input, end) : end;
    }
  }
}

/**
 * Create a UserRegex from a pattern string.
 * This is the entry point for user-provided regex patterns.
 *
 * @throws PatternCompileError if the pattern is invalid
 */
export function createUserRegex(
  pattern: string,
  ignoreCase = false,
): UserRegex {
  return new UserRegex(pattern, ignoreCase);
}
