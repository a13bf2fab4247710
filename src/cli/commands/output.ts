/**
 * CLI output helpers.
 *
 * Uses process.stdout/stderr.write directly so tests can spy on them.
 */

/** Write a line to stdout. */
export function println(message: string): void {
  process.stdout.write(`${message}\n`);
}

/** Write a line to stderr. */
export function errorln(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Write captured output unchanged, adding a trailing newline if it has none. */
export function writeCaptured(stream: NodeJS.WriteStream, text: string): void {
  if (text === '') return;
  stream.write(text.endsWith('\n') ? text : `${text}\n`);
}

/** Error with an exit code for CLI command failures. */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}
