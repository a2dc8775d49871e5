/** Outcome of a CLI invocation, written to the process streams by the entry point */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * File acquisition for the CLI. The search core never touches the file
 * system; the entry point supplies Node-backed readers, tests supply maps.
 */
export interface CliIo {
  /** Read a file as UTF-8 text; throws if it cannot be read */
  readFile(path: string): string;
  /** Read all of standard input as UTF-8 text */
  readStdin(): string;
}
