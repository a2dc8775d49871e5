import type { FileInput, Matcher, MatchResult } from "../types.js";
import { advanceColumn, splitLines } from "./lines.js";

/**
 * Append the matches of a single file to `results`.
 * Matches arrive left to right, so the column is advanced incrementally
 * instead of being recounted from the start of the line.
 */
function scanFile(
  matcher: Matcher,
  file: FileInput,
  results: MatchResult[],
): void {
  const lines = splitLines(file.content);

  for (let i = 0; i < lines.length; i++) {
    const lineText = lines[i];
    let offset = 0;
    let column = 1;

    for (const match of matcher.findAll(lineText)) {
      column = advanceColumn(lineText, offset, match.start, column);
      offset = match.start;
      results.push({
        path: file.path,
        line: i + 1,
        column,
        lineText,
      });
    }
  }
}

/**
 * Scan files line by line with a compiled matcher.
 *
 * Results follow input file order, then line, then column. Each line is
 * matched in isolation, so no match ever spans a line break.
 */
export function scan(
  matcher: Matcher,
  files: readonly FileInput[],
): MatchResult[] {
  const results: MatchResult[] = [];
  for (const file of files) {
    scanFile(matcher, file, results);
  }
  return results;
}
