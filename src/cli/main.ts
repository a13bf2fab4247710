/**
 * askai command dispatch and error reporting.
 *
 * runCli is the single place where failures become CliErrors with an exit
 * code. The bin entry (cli.ts) only prints them.
 */

import * as os from 'node:os';
import { FileConfigStore, type ConfigStore } from '../config.js';
import {
  AskaiError,
  ExecutableNotFoundError,
  NonZeroExitError,
  UsageError,
} from '../errors.js';
import { Invoker, type ProcessRunner } from '../invoker.js';
import { defaultRegistry, type ProviderRegistry } from '../providers/registry.js';
import { parseCliArgs, type CliAction } from './args.js';
import { runAskCommand } from './commands/ask.js';
import {
  runConfigPathCommand,
  runConfigResetCommand,
  runConfigSetModelCommand,
  runConfigSetProviderCommand,
  runConfigShowCommand,
} from './commands/config.js';
import {
  runListModelsCommand,
  runListProvidersCommand,
  runVersionCommand,
} from './commands/info.js';
import { CliError, println } from './commands/output.js';
import { isCommandAvailable } from './executable.js';
import { Logger, resolveLogLevel } from './logger.js';

export const USAGE = `\
Usage: askai [options] <question...>

Ask a one-shot question to an LLM command-line tool and print a concise answer.

Options:
  -p, --provider <key>          Provider to use (default: from config or 'claude')
  -m, --model <model>           Model alias or identifier (default: from config)
  -v, --verbose                 Show the command being executed
  --dry-run                     Print the command without running it
  -h, --help                    Show this help message

Commands:
  --list-providers              List providers and whether they are installed
  --list-models <provider>      List models and aliases of a provider
  --config-show                 Show the effective configuration
  --config-path                 Show the configuration file path
  --config-reset                Reset the configuration file to defaults
  --config-set-provider <key>   Set the default provider
  --config-set-model <model>    Set the default model (of -p or the default provider)
  --version                     Show version number

Examples:
  askai "what is python?"
  askai -m sonnet "explain async/await"
  askai -p claude -m opus -- "-1 in two's complement?"`;

export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_NOT_FOUND = 127;

export interface CliDeps {
  store?: ConfigStore;
  registry?: ProviderRegistry;
  /** Process runner for queries. Used for testing. */
  runner?: ProcessRunner;
  /** PATH probe for --list-providers. Used for testing. */
  isExecutableAvailable?: (executable: string) => boolean;
  /** Log sink (default: stderr). Used for testing. */
  logWrite?: (message: string) => void;
}

function signalNumber(signal: NodeJS.Signals): number | undefined {
  const signals: Readonly<Record<string, number | undefined>> = {
    ...os.constants.signals,
  };
  return signals[signal];
}

/** Exit code for a failed external tool: its own code, or 128 + signal. */
export function delegatedExitCode(error: NonZeroExitError): number {
  if (error.exitCode !== null && error.exitCode !== 0) return error.exitCode;
  if (error.signal !== null) {
    const signum = signalNumber(error.signal);
    if (signum !== undefined) return 128 + signum;
  }
  return 1;
}

/** Map a core error to a CliError; other values are returned unchanged. */
export function toCliError(error: unknown): unknown {
  if (!(error instanceof AskaiError)) return error;
  if (error instanceof UsageError) {
    return new CliError(
      `${error.message}\nRun 'askai --help' for usage.`,
      EXIT_USAGE,
    );
  }
  if (error instanceof NonZeroExitError) {
    return new CliError(error.message, delegatedExitCode(error));
  }
  if (error instanceof ExecutableNotFoundError) {
    return new CliError(error.message, EXIT_NOT_FOUND);
  }
  switch (error.category) {
    case 'config':
      return new CliError(error.message, EXIT_CONFIG);
    case 'usage':
      return new CliError(error.message, EXIT_USAGE);
    default:
      return new CliError(error.message, 1);
  }
}

async function dispatch(action: CliAction, verbose: boolean, deps: CliDeps): Promise<void> {
  const store = deps.store ?? new FileConfigStore();
  const registry = deps.registry ?? defaultRegistry;
  const logger = new Logger({
    level: resolveLogLevel(verbose),
    writeFn: deps.logWrite,
  });

  switch (action.kind) {
    case 'help':
      println(USAGE);
      break;
    case 'version':
      runVersionCommand();
      break;
    case 'list-providers':
      runListProvidersCommand(
        registry,
        deps.isExecutableAvailable ?? isCommandAvailable,
      );
      break;
    case 'list-models':
      runListModelsCommand(registry, action.provider);
      break;
    case 'config-path':
      runConfigPathCommand(store);
      break;
    case 'config-show':
      await runConfigShowCommand(store);
      break;
    case 'config-reset':
      await runConfigResetCommand(store);
      break;
    case 'config-set-provider':
      await runConfigSetProviderCommand(store, registry, action.provider);
      break;
    case 'config-set-model':
      await runConfigSetModelCommand(store, registry, action.model, action.provider);
      break;
    case 'ask':
      await runAskCommand(action.query, {
        store,
        registry,
        invoker: new Invoker({ runner: deps.runner, logger }),
        logger,
      });
      break;
  }
}

/**
 * Run askai with argv (without the node and script entries).
 *
 * @throws CliError carrying the exit code for every expected failure.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<void> {
  try {
    const { action, verbose } = parseCliArgs(argv);
    await dispatch(action, verbose, deps);
  }
  catch (err) {
    throw toCliError(err);
  }
}
