#!/usr/bin/env node
/**
 * multifind CLI - print every regular expression match in a set of files
 *
 * Usage:
 *   multifind [options] PATTERN [FILE]...
 *   cat file.txt | multifind [options] PATTERN
 *
 * See `multifind --help` for the options.
 */

import { readFileSync } from "node:fs";
import { runMultifind } from "./run.js";

const result = runMultifind(process.argv.slice(2), {
  readFile: (path) => readFileSync(path, "utf-8"),
  readStdin: () => readFileSync(0, "utf-8"),
});

process.stdout.write(result.stdout);
process.stderr.write(result.stderr);
process.exitCode = result.exitCode;
