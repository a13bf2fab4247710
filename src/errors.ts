/**
 * Error taxonomy for provider resolution, command construction and
 * execution.
 *
 * Every error carries a category. The CLI boundary maps categories to
 * exit codes; nothing inside the core retries or recovers.
 */

export type ErrorCategory = 'usage' | 'config' | 'environment' | 'delegated';

export abstract class AskaiError extends Error {
  abstract readonly category: ErrorCategory;
}

/** Invalid command-line usage (unknown option, conflicting flags). */
export class UsageError extends AskaiError {
  readonly category = 'usage';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class UnknownProviderError extends AskaiError {
  readonly category = 'usage';
  readonly provider: string;
  readonly known: readonly string[];

  constructor(provider: string, known: readonly string[]) {
    super(`Unknown provider '${provider}'. Available: ${known.join(', ')}`);
    this.name = 'UnknownProviderError';
    this.provider = provider;
    this.known = known;
  }
}

/** A provider that is declared in the catalog but not implemented yet. */
export class ProviderUnavailableError extends AskaiError {
  readonly category = 'usage';
  readonly provider: string;

  constructor(provider: string) {
    super(`Provider '${provider}' is coming in a future release.`);
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
  }
}

export class UnknownModelError extends AskaiError {
  readonly category = 'usage';
  readonly provider: string;
  readonly input: string;
  /** Canonical models of the provider. */
  readonly suggestions: readonly string[];

  constructor(provider: string, input: string, suggestions: readonly string[]) {
    super(
      `Unknown model '${input}' for provider '${provider}'. `
      + `Available: ${suggestions.join(', ')}`,
    );
    this.name = 'UnknownModelError';
    this.provider = provider;
    this.input = input;
    this.suggestions = suggestions;
  }
}

export class InvalidPromptError extends AskaiError {
  readonly category = 'usage';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidPromptError';
  }
}

/** The persisted config file could not be parsed or validated. */
export class ConfigInvalidError extends AskaiError {
  readonly category = 'config';
  readonly path: string;

  constructor(path: string, detail: string) {
    super(
      `Invalid config file ${path}: ${detail}\n`
      + 'Run \'askai --config-reset\' to restore the defaults.',
    );
    this.name = 'ConfigInvalidError';
    this.path = path;
  }
}

/** The provider's executable is missing from the environment. */
export class ExecutableNotFoundError extends AskaiError {
  readonly category = 'environment';
  readonly executable: string;

  constructor(executable: string, installHint: string) {
    super(`${executable} CLI not found in PATH. ${installHint}`);
    this.name = 'ExecutableNotFoundError';
    this.executable = executable;
  }
}

/** The external tool ran but reported failure. */
export class NonZeroExitError extends AskaiError {
  readonly category = 'delegated';
  readonly executable: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(options: {
    executable: string;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
  }) {
    const reason = options.signal !== null
      ? `was terminated by ${options.signal}`
      : `exited with code ${String(options.exitCode)}`;
    super(`The query failed: ${options.executable} ${reason}`);
    this.name = 'NonZeroExitError';
    this.executable = options.executable;
    this.exitCode = options.exitCode;
    this.signal = options.signal;
    this.stdout = options.stdout;
    this.stderr = options.stderr;
  }
}
