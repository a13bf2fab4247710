/**
 * Command-line parsing for askai.
 *
 * Turns argv into exactly one action: an information/config command or a
 * question. Positional words are joined into the question; `--` ends option
 * parsing so a question may start with a dash.
 */

import { parseArgs } from 'node:util';
import { UsageError } from '../errors.js';
import type { QueryArgs } from '../request.js';

export type CliAction =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'list-providers' }
  | { kind: 'list-models'; provider: string }
  | { kind: 'config-show' }
  | { kind: 'config-path' }
  | { kind: 'config-reset' }
  | { kind: 'config-set-provider'; provider: string }
  | { kind: 'config-set-model'; model: string; provider?: string }
  | { kind: 'ask'; query: QueryArgs };

export interface ParsedCli {
  action: CliAction;
  verbose: boolean;
}

function isParseArgsError(err: unknown): err is Error & { code: string } {
  return err instanceof Error
    && 'code' in err
    && typeof err.code === 'string'
    && err.code.startsWith('ERR_PARSE_ARGS_');
}

function requireValue(flag: string, value: string): string {
  if (value.trim() === '') {
    throw new UsageError(`${flag} requires a non-empty value`);
  }
  return value;
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        'provider': { type: 'string', short: 'p' },
        'model': { type: 'string', short: 'm' },
        'list-providers': { type: 'boolean' },
        'list-models': { type: 'string' },
        'config-show': { type: 'boolean' },
        'config-path': { type: 'boolean' },
        'config-reset': { type: 'boolean' },
        'config-set-provider': { type: 'string' },
        'config-set-model': { type: 'string' },
        'version': { type: 'boolean' },
        'help': { type: 'boolean', short: 'h' },
        'verbose': { type: 'boolean', short: 'v' },
        'dry-run': { type: 'boolean' },
      },
    });
  }
  catch (err) {
    if (isParseArgsError(err)) {
      throw new UsageError(err.message);
    }
    throw err;
  }
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws UsageError for unknown options, missing values, conflicting
 *         commands and a missing question.
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const parsed = parseRawArgs(argv);
  const { values, positionals } = parsed;
  const verbose = values.verbose === true;

  if (values.help === true) {
    return { action: { kind: 'help' }, verbose };
  }

  const commands: Array<{ flag: string; action: CliAction }> = [];
  if (values.version === true) {
    commands.push({ flag: '--version', action: { kind: 'version' } });
  }
  if (values['list-providers'] === true) {
    commands.push({ flag: '--list-providers', action: { kind: 'list-providers' } });
  }
  if (values['list-models'] !== undefined) {
    commands.push({
      flag: '--list-models',
      action: {
        kind: 'list-models',
        provider: requireValue('--list-models', values['list-models']),
      },
    });
  }
  if (values['config-show'] === true) {
    commands.push({ flag: '--config-show', action: { kind: 'config-show' } });
  }
  if (values['config-path'] === true) {
    commands.push({ flag: '--config-path', action: { kind: 'config-path' } });
  }
  if (values['config-reset'] === true) {
    commands.push({ flag: '--config-reset', action: { kind: 'config-reset' } });
  }
  if (values['config-set-provider'] !== undefined) {
    commands.push({
      flag: '--config-set-provider',
      action: {
        kind: 'config-set-provider',
        provider: requireValue('--config-set-provider', values['config-set-provider']),
      },
    });
  }
  if (values['config-set-model'] !== undefined) {
    commands.push({
      flag: '--config-set-model',
      action: {
        kind: 'config-set-model',
        model: requireValue('--config-set-model', values['config-set-model']),
        provider: values.provider,
      },
    });
  }

  const [command, ...others] = commands;
  if (command !== undefined) {
    if (others.length > 0) {
      const flags = commands.map(c => c.flag).join(', ');
      throw new UsageError(`Only one command can be used at a time (got ${flags})`);
    }
    if (positionals.length > 0) {
      throw new UsageError(`${command.flag} cannot be combined with a question`);
    }
    if (values['dry-run'] === true) {
      throw new UsageError(`--dry-run cannot be used with ${command.flag}`);
    }
    if (values.model !== undefined) {
      throw new UsageError(`--model cannot be used with ${command.flag}`);
    }
    // --config-set-model is the only command that takes a provider
    if (values.provider !== undefined && command.action.kind !== 'config-set-model') {
      throw new UsageError(`--provider cannot be used with ${command.flag}`);
    }
    return { action: command.action, verbose };
  }

  if (positionals.length === 0) {
    throw new UsageError('Missing question.');
  }

  return {
    action: {
      kind: 'ask',
      query: {
        prompt: positionals.join(' '),
        provider: values.provider,
        model: values.model,
        verbose,
        dryRun: values['dry-run'] === true,
      },
    },
    verbose,
  };
}
