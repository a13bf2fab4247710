import { describe, expect, it, vi } from 'vitest';
import { buildCommand, type BuiltCommand } from './command.js';
import { ExecutableNotFoundError, NonZeroExitError } from './errors.js';
import {
  Invoker,
  spawnRunner,
  type ProcessOutcome,
  type ProcessRunner,
} from './invoker.js';
import { createProviderRegistry, defaultRegistry } from './providers/registry.js';
import { resolveRequest } from './request.js';

function claudeCommand(prompt = 'What is 2+2?'): BuiltCommand {
  return buildCommand(
    resolveRequest(
      { prompt, model: 'haiku', verbose: false, dryRun: false },
      {},
      defaultRegistry,
    ),
  );
}

function outcome(overrides: Partial<ProcessOutcome> = {}): ProcessOutcome {
  return { exitCode: 0, signal: null, stdout: '', stderr: '', ...overrides };
}

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`spawn claude ${code}`);
  error.code = code;
  return error;
}

describe('Invoker', () => {
  it('does not call the runner in dry-run mode', async () => {
    const runner = vi.fn<ProcessRunner>();
    const command = claudeCommand();
    const result = await new Invoker({ runner }).run(command, { dryRun: true });

    expect(runner).not.toHaveBeenCalled();
    expect(result).toEqual({ kind: 'dry-run', display: command.display });
    expect(command.display).not.toBe('');
  });

  it('passes the argument vector verbatim', async () => {
    const runner = vi.fn<ProcessRunner>(async () => outcome({ stdout: '4\n' }));
    const command = claudeCommand();
    await new Invoker({ runner }).run(command, { dryRun: false });

    expect(runner).toHaveBeenCalledOnce();
    expect(runner).toHaveBeenCalledWith('claude', command.spec.args);
  });

  it('returns captured output on success', async () => {
    const runner: ProcessRunner = async () =>
      outcome({ stdout: '4\n', stderr: 'note\n' });
    const result = await new Invoker({ runner }).run(claudeCommand(), {
      dryRun: false,
    });
    expect(result).toEqual({
      kind: 'completed',
      exitCode: 0,
      stdout: '4\n',
      stderr: 'note\n',
    });
  });

  it('maps ENOENT to ExecutableNotFoundError with the install hint', async () => {
    const runner: ProcessRunner = async () => {
      throw errnoError('ENOENT');
    };
    const promise = new Invoker({ runner }).run(claudeCommand(), { dryRun: false });
    await expect(promise).rejects.toThrow(ExecutableNotFoundError);
    await expect(promise).rejects.toThrow(
      'claude CLI not found in PATH. Install it with: npm install -g @anthropic-ai/claude-code',
    );
  });

  it('rethrows other spawn errors unchanged', async () => {
    const error = errnoError('EACCES');
    const runner: ProcessRunner = async () => {
      throw error;
    };
    await expect(
      new Invoker({ runner }).run(claudeCommand(), { dryRun: false }),
    ).rejects.toBe(error);
  });

  it('throws NonZeroExitError carrying the exit code and output', async () => {
    const runner: ProcessRunner = async () =>
      outcome({ exitCode: 2, stdout: 'partial', stderr: 'rate limited' });
    const promise = new Invoker({ runner }).run(claudeCommand(), { dryRun: false });

    await expect(promise).rejects.toThrow(
      'The query failed: claude exited with code 2',
    );
    await expect(promise).rejects.toMatchObject({
      executable: 'claude',
      exitCode: 2,
      signal: null,
      stdout: 'partial',
      stderr: 'rate limited',
    });
  });

  it('throws NonZeroExitError when the process is killed', async () => {
    const runner: ProcessRunner = async () =>
      outcome({ exitCode: null, signal: 'SIGTERM' });
    const promise = new Invoker({ runner }).run(claudeCommand(), { dryRun: false });

    await expect(promise).rejects.toThrow(NonZeroExitError);
    await expect(promise).rejects.toThrow(
      'The query failed: claude was terminated by SIGTERM',
    );
  });

  it('logs process start and exit at debug level', async () => {
    const debug = vi.fn();
    const logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const runner: ProcessRunner = async () => outcome();
    await new Invoker({ runner, logger }).run(claudeCommand(), { dryRun: false });

    expect(debug.mock.calls).toEqual([
      ['spawning claude with 7 arguments'],
      ['claude finished (code: 0, signal: null)'],
    ]);
  });
});

describe('spawnRunner', () => {
  const echoLastArg
    = 'process.stdout.write(JSON.stringify(process.argv[process.argv.length - 1]))';

  it.each([
    'What is 2+2?',
    'say "hello" and \'bye\'',
    'a; echo injected',
    'echo `whoami` $(id) $HOME',
    'line one\nline two\r\n\ttabbed',
    '* ? [a-z] ~ | & > < \\',
  ])('delivers %j to the process byte-for-byte', async (prompt) => {
    const result = await spawnRunner(process.execPath, ['-e', echoLastArg, prompt]);
    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.stdout)).toBe(prompt);
  });

  it('delivers the prompt of a built command unmodified', async () => {
    const registry = createProviderRegistry([
      {
        key: 'echo',
        displayName: 'Echo',
        models: ['m1'],
        defaultModel: 'm1',
        aliases: new Map(),
        command: {
          executable: process.execPath,
          args: ['-e', echoLastArg, { slot: 'model' }],
        },
        available: true,
        installHint: 'Install node.',
      },
    ]);
    const prompt = 'He said "hi"; `date`\n$(whoami) \'quoted\'';
    const command = buildCommand(
      resolveRequest(
        { prompt, provider: 'echo', verbose: false, dryRun: false },
        {},
        registry,
      ),
    );
    const result = await new Invoker().run(command, { dryRun: false });

    expect(result.kind).toBe('completed');
    if (result.kind === 'completed') {
      expect(JSON.parse(result.stdout)).toBe(prompt);
    }
  });

  it('captures stderr and the exit code of a failing process', async () => {
    const result = await spawnRunner(process.execPath, [
      '-e',
      'process.stderr.write("bad"); process.exit(3)',
    ]);
    expect(result).toEqual({ exitCode: 3, signal: null, stdout: '', stderr: 'bad' });
  });

  it('rejects with ENOENT for a missing executable', async () => {
    await expect(
      spawnRunner('askai-test-no-such-executable', []),
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
