import { toWire } from "../host/adapter.js";
import { resolveSearchOptions } from "../options.js";
import { compile, scan } from "../search/index.js";
import type { FileInput, SearchLogger } from "../types.js";
import { parseArgs } from "../utils/args.js";
import type { CliIo, ExecResult } from "./types.js";

export const VERSION = "0.1.0";

/** Path reported for content read from standard input */
export const STDIN_PATH = "(standard input)";

const HELP_TEXT = `multifind - print the location of every regular expression match

Usage:
  multifind [options] PATTERN [FILE]...
  cat file.txt | multifind [options] PATTERN

Options:
  -i, --ignore-case  Ignore case distinctions
  -c, --count        Print only the number of matches
  --json             Print matches as a JSON array
  --verbose          Log progress to standard error
  -h, --help         Show this help message
  -v, --version      Show version

Output:
  Each match is printed as PATH:LINE:COLUMN:TEXT. Columns count characters,
  and lines are matched one at a time, so a match never spans a line break.
  With no FILE, or when FILE is -, standard input is searched.

Exit status:
  0 if a match was found, 1 if none, 2 on an invalid pattern or unreadable file.

Examples:
  multifind 'TODO|FIXME' src/index.ts src/cli/run.ts
  cat notes.txt | multifind -i --json 'error \\d+'
`;

const argDefs = {
  ignoreCase: { short: "i", long: "ignore-case" },
  count: { short: "c", long: "count" },
  json: { long: "json" },
  verbose: { long: "verbose" },
  help: { short: "h", long: "help" },
  version: { short: "v", long: "version" },
};

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logger that writes `[multifind] message {data}` lines through `write`.
 */
export function createLineLogger(write: (line: string) => void): SearchLogger {
  const emit = (message: string, data?: Record<string, unknown>) => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    write(`[multifind] ${message}${suffix}\n`);
  };
  return { info: emit, debug: emit };
}

/**
 * Run the multifind command against the given arguments.
 *
 * The pattern is compiled before any file is read; an invalid pattern
 * reports the compile message verbatim and reads nothing.
 */
export function runMultifind(args: string[], io: CliIo): ExecResult {
  const parsed = parseArgs("multifind", args, argDefs);
  if (!parsed.ok) {
    return parsed.error;
  }
  const { flags, positional } = parsed.result;

  if (flags.help) {
    return { stdout: HELP_TEXT, stderr: "", exitCode: 0 };
  }
  if (flags.version) {
    return { stdout: `multifind ${VERSION}\n`, stderr: "", exitCode: 0 };
  }

  const [pattern, ...paths] = positional;
  if (pattern === undefined) {
    return {
      stdout: "",
      stderr: "multifind: missing pattern\n",
      exitCode: 2,
    };
  }

  let stderr = "";
  const options = resolveSearchOptions({
    caseSensitive: !flags.ignoreCase,
    logger: flags.verbose
      ? createLineLogger((line) => {
          stderr += line;
        })
      : undefined,
  });
  const { logger } = options;

  const compiled = compile(pattern, options.caseSensitive);
  if (!compiled.ok) {
    return {
      stdout: "",
      stderr: `${stderr}multifind: ${compiled.error.message}\n`,
      exitCode: 2,
    };
  }

  const files: FileInput[] = [];
  let hadReadError = false;
  for (const path of paths.length > 0 ? paths : ["-"]) {
    try {
      const file =
        path === "-"
          ? { path: STDIN_PATH, content: io.readStdin() }
          : { path, content: io.readFile(path) };
      logger?.debug("read", { path: file.path, length: file.content.length });
      files.push(file);
    } catch (error) {
      hadReadError = true;
      stderr += `multifind: ${path}: ${getErrorMessage(error)}\n`;
    }
  }

  const matches = scan(compiled.matcher, files);
  logger?.info("search", {
    pattern,
    caseSensitive: options.caseSensitive,
    files: files.length,
    matches: matches.length,
  });

  let stdout: string;
  if (flags.count) {
    stdout = `${matches.length}\n`;
  } else if (flags.json) {
    stdout = `${JSON.stringify(matches.map(toWire))}\n`;
  } else {
    stdout = matches
      .map((m) => `${m.path}:${m.line}:${m.column}:${m.lineText}\n`)
      .join("");
  }

  let exitCode: number;
  if (hadReadError) {
    exitCode = 2;
  } else {
    exitCode = matches.length > 0 ? 0 : 1;
  }

  return { stdout, stderr, exitCode };
}
