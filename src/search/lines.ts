/**
 * Line splitting and column accounting for the line scanner.
 */

/**
 * Split content into lines on `\n`.
 *
 * A trailing `\n` terminates the last line instead of opening an empty one,
 * and a `\r` directly before a `\n` belongs to the terminator. Empty content
 * has no lines at all.
 *
 * @example
 * splitLines("a\r\nb\n") // ["a", "b"]
 * splitLines("a\n\n")    // ["a", ""]
 * splitLines("")         // []
 */
export function splitLines(content: string): string[] {
  if (content === "") {
    return [];
  }

  const endsWithNewline = content.endsWith("\n");
  const lines = content.split("\n");
  if (endsWithNewline) {
    lines.pop();
  }

  // Every line but an unterminated final one was followed by "\n"
  const terminated = endsWithNewline ? lines.length : lines.length - 1;
  for (let i = 0; i < terminated; i++) {
    if (lines[i].endsWith("\r")) {
      lines[i] = lines[i].slice(0, -1);
    }
  }

  return lines;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Move a column forward over `line[from..to)`, counting code points rather
 * than UTF-16 units, and return the column reached at `to`.
 */
export function advanceColumn(
  line: string,
  from: number,
  to: number,
  column: number,
): number {
  let i = from;
  while (i < to) {
    if (
      isHighSurrogate(line.charCodeAt(i)) &&
      i + 1 < to &&
      isLowSurrogate(line.charCodeAt(i + 1))
    ) {
      i += 2;
    } else {
      i++;
    }
    column++;
  }
  return column;
}

