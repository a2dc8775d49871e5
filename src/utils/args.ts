/**
 * Lightweight flag parser for the CLI.
 *
 * Handles:
 * - Boolean flags: -i, --ignore-case
 * - Combined short flags: -ic (same as -i -c)
 * - Positional arguments, with "--" ending flag parsing and "-" kept as a
 *   positional (standard input)
 * - Unknown option detection
 */

import type { ExecResult } from "../cli/types.js";

/**
 * Error result for an unknown option: "invalid option -- 'x'" for short
 * options, "unrecognized option '--xxx'" for long ones.
 */
function unknownOption(cmdName: string, option: string): ExecResult {
  const msg = option.startsWith("--")
    ? `${cmdName}: unrecognized option '${option}'\n`
    : `${cmdName}: invalid option -- '${option.replace(/^-/, "")}'\n`;
  return { stdout: "", stderr: msg, exitCode: 2 };
}

export interface FlagDef {
  /** Short form without dash, e.g., "i" for -i */
  short?: string;
  /** Long form without dashes, e.g., "ignore-case" for --ignore-case */
  long?: string;
}

export interface ParsedArgs<T extends Record<string, FlagDef>> {
  /** Parsed flag values; every flag defaults to false */
  flags: { [K in keyof T]: boolean };
  /** Positional arguments (non-flag arguments) */
  positional: string[];
}

export type ParseResult<T extends Record<string, FlagDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ExecResult };

/**
 * Parse command arguments according to the provided flag definitions.
 *
 * @param cmdName - Command name for error messages
 * @param args - Arguments to parse
 * @param defs - Flag definitions
 * @returns Parsed arguments or error result
 *
 * @example
 * const defs = {
 *   ignoreCase: { short: "i", long: "ignore-case" },
 *   json: { long: "json" },
 * };
 * const result = parseArgs("multifind", args, defs);
 * if (!result.ok) return result.error;
 * const { flags, positional } = result.result;
 */
export function parseArgs<T extends Record<string, FlagDef>>(
  cmdName: string,
  args: string[],
  defs: T,
): ParseResult<T> {
  const shortToName = new Map<string, string>();
  const longToName = new Map<string, string>();

  // Use null-prototype to prevent prototype pollution
  const flags: Record<string, boolean> = Object.create(null);
  for (const [name, def] of Object.entries(defs)) {
    if (def.short) shortToName.set(def.short, name);
    if (def.long) longToName.set(def.long, name);
    flags[name] = false;
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (const arg of args) {
    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const name = longToName.get(arg.slice(2));
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }
      flags[name] = true;
      continue;
    }

    for (const c of arg.slice(1)) {
      const name = shortToName.get(c);
      if (name === undefined) {
        return { ok: false, error: unknownOption(cmdName, `-${c}`) };
      }
      flags[name] = true;
    }
  }

  return {
    ok: true,
    result: {
      flags: flags as ParsedArgs<T>["flags"],
      positional,
    },
  };
}
