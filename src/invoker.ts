/**
 * One-shot execution of a built command.
 *
 * The executable is spawned without a shell, stdin closed, and stdout and
 * stderr captured until the process exits. There is no timeout; the
 * external CLI decides how long a query takes.
 */

import { spawn } from 'node:child_process';
import type { BuiltCommand } from './command.js';
import { ExecutableNotFoundError, NonZeroExitError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/** Exit status and captured output of a finished process. */
export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable with an argument vector and resolves when it exits.
 * Rejects with the spawn error when the process cannot be started.
 */
export type ProcessRunner = (
  executable: string,
  args: readonly string[],
) => Promise<ProcessOutcome>;

export type ExecutionResult =
  | { kind: 'dry-run'; display: string }
  | { kind: 'completed'; exitCode: 0; stdout: string; stderr: string };

export interface InvokerOptions {
  /**
   * Custom process runner. Used for testing.
   * Default: spawnRunner.
   */
  runner?: ProcessRunner;
  logger?: Logger;
}

/** Default runner: `spawn` with `shell: false` and captured output. */
export const spawnRunner: ProcessRunner = async (executable, args) =>
  new Promise<ProcessOutcome>((resolve, reject) => {
    const child = spawn(executable, [...args], {
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.on('close', (exitCode, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode, signal, stdout, stderr });
    });
  });

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class Invoker {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options?: InvokerOptions) {
    this.runner = options?.runner ?? spawnRunner;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Run the command, or only return its rendering when `dryRun` is set.
   *
   * @throws ExecutableNotFoundError when the executable is not installed.
   * @throws NonZeroExitError when it exits non-zero or is killed by a signal.
   */
  async run(
    command: BuiltCommand,
    options: { dryRun: boolean },
  ): Promise<ExecutionResult> {
    if (options.dryRun) {
      return { kind: 'dry-run', display: command.display };
    }

    const { executable, args } = command.spec;
    this.logger.debug(`spawning ${executable} with ${args.length} arguments`);

    let outcome: ProcessOutcome;
    try {
      outcome = await this.runner(executable, args);
    }
    catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw new ExecutableNotFoundError(executable, command.installHint);
      }
      throw err;
    }

    this.logger.debug(
      `${executable} finished (code: ${String(outcome.exitCode)}, signal: ${String(outcome.signal)})`,
    );

    if (outcome.exitCode !== 0) {
      throw new NonZeroExitError({ executable, ...outcome });
    }
    return {
      kind: 'completed',
      exitCode: 0,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
    };
  }
}
