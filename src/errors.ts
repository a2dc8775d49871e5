/**
 * Error raised when a user-supplied pattern cannot be compiled.
 *
 * The message is meant to be shown to the user verbatim: it names the
 * offending pattern and carries the regex engine's description of what is
 * wrong with it.
 */
export class PatternCompileError extends Error {
  /** The pattern text exactly as the caller supplied it */
  readonly pattern: string;
  /** The engine's description of the syntax problem */
  readonly reason: string;

  constructor(pattern: string, reason: string, explanation = "") {
    super(`Invalid regex pattern '${pattern}': ${reason}${explanation}`);
    this.name = "PatternCompileError";
    this.pattern = pattern;
    this.reason = reason;
  }
}
