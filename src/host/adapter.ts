/**
 * Host adapter - exposes search() to script hosts that pass untyped values
 * (a browser page, a worker message, a JSON bridge).
 *
 * Arguments are validated with zod, results are translated to the wire
 * shape `{ path, line, column, line_text }`, and every failure is thrown as
 * a plain Error whose message can be shown to the user as-is.
 *
 * @example
 * ```typescript
 * import { searchValues } from "multifind/browser";
 *
 * const hits = searchValues("todo", [{ path: "a.ts", content: src }], false);
 * ```
 */

import { type ZodError, z } from "zod";
import { type SearchOptions, resolveSearchOptions } from "../options.js";
import { search } from "../search/index.js";
import type { MatchResult } from "../types.js";

const patternSchema = z.string();

const filesSchema = z.array(
  z.object({
    path: z.string(),
    content: z.string(),
  }),
);

const caseSensitiveSchema = z.boolean().optional();

/** A match record as it crosses the host boundary */
export interface WireMatchResult {
  path: string;
  line: number;
  column: number;
  line_text: string;
}

export type HostOptions = Omit<SearchOptions, "caseSensitive">;

function formatIssues(argument: string, error: ZodError): string {
  const details = error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
  return `Invalid ${argument}: ${details}`;
}

/** Translate a core match into its wire shape */
export function toWire(match: MatchResult): WireMatchResult {
  return {
    path: match.path,
    line: match.line,
    column: match.column,
    line_text: match.lineText,
  };
}

/**
 * Validate host-supplied arguments and run a search.
 *
 * @param pattern - Must be a string
 * @param files - Must be an array of `{ path: string, content: string }`
 * @param caseSensitive - Boolean, or undefined for the default (true)
 * @throws Error with the validation problem or the compile message verbatim
 */
export function searchValues(
  pattern: unknown,
  files: unknown,
  caseSensitive?: unknown,
  options?: HostOptions,
): WireMatchResult[] {
  const parsedPattern = patternSchema.safeParse(pattern);
  if (!parsedPattern.success) {
    throw new Error(formatIssues("pattern", parsedPattern.error));
  }
  const parsedFiles = filesSchema.safeParse(files);
  if (!parsedFiles.success) {
    throw new Error(formatIssues("files", parsedFiles.error));
  }
  const parsedCase = caseSensitiveSchema.safeParse(caseSensitive);
  if (!parsedCase.success) {
    throw new Error(formatIssues("caseSensitive", parsedCase.error));
  }

  const resolved = resolveSearchOptions({
    ...options,
    caseSensitive: parsedCase.data,
  });

  const result = search(
    parsedPattern.data,
    parsedFiles.data,
    resolved.caseSensitive,
  );
  if (!result.ok) {
    resolved.logger?.info("search failed", {
      pattern: parsedPattern.data,
      error: result.error.message,
    });
    throw new Error(result.error.message);
  }

  resolved.logger?.info("search", {
    pattern: parsedPattern.data,
    caseSensitive: resolved.caseSensitive,
    files: parsedFiles.data.length,
    matches: result.matches.length,
  });

  return result.matches.map(toWire);
}
