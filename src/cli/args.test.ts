import { describe, expect, it } from 'vitest';
import { UsageError } from '../errors.js';
import { parseCliArgs } from './args.js';

describe('parseCliArgs', () => {
  describe('questions', () => {
    it('parses a quoted question', () => {
      expect(parseCliArgs(['What is 2+2?'])).toEqual({
        action: {
          kind: 'ask',
          query: {
            prompt: 'What is 2+2?',
            provider: undefined,
            model: undefined,
            verbose: false,
            dryRun: false,
          },
        },
        verbose: false,
      });
    });

    it('joins several positional words', () => {
      const { action } = parseCliArgs(['what', 'is', 'rust']);
      expect(action).toMatchObject({ kind: 'ask', query: { prompt: 'what is rust' } });
    });

    it('reads provider and model flags', () => {
      const { action } = parseCliArgs(['-p', 'claude', '-m', 'haiku-4-5', 'What is 2+2?']);
      expect(action).toMatchObject({
        kind: 'ask',
        query: { provider: 'claude', model: 'haiku-4-5', prompt: 'What is 2+2?' },
      });
    });

    it('reads long flags', () => {
      const { action } = parseCliArgs(['--provider', 'claude', '--model=opus', 'q']);
      expect(action).toMatchObject({ query: { provider: 'claude', model: 'opus' } });
    });

    it('reads --verbose and --dry-run', () => {
      const parsed = parseCliArgs(['-v', '--dry-run', 'q']);
      expect(parsed.verbose).toBe(true);
      expect(parsed.action).toMatchObject({
        kind: 'ask',
        query: { verbose: true, dryRun: true },
      });
    });

    it('accepts a question starting with a dash after --', () => {
      const { action } = parseCliArgs(['--', '-1 plus 1?']);
      expect(action).toMatchObject({ kind: 'ask', query: { prompt: '-1 plus 1?' } });
    });

    it('requires a question', () => {
      expect(() => parseCliArgs([])).toThrow(
        new UsageError('Missing question.'),
      );
    });

    it('requires a question even with flags', () => {
      expect(() => parseCliArgs(['-m', 'sonnet'])).toThrow(UsageError);
    });
  });

  describe('commands', () => {
    it.each([
      [['--list-providers'], { kind: 'list-providers' }],
      [['--list-models', 'claude'], { kind: 'list-models', provider: 'claude' }],
      [['--config-show'], { kind: 'config-show' }],
      [['--config-path'], { kind: 'config-path' }],
      [['--config-reset'], { kind: 'config-reset' }],
      [['--config-set-provider', 'claude'], { kind: 'config-set-provider', provider: 'claude' }],
      [['--version'], { kind: 'version' }],
      [['-h'], { kind: 'help' }],
      [['--help'], { kind: 'help' }],
    ])('parses %j', (argv, expected) => {
      expect(parseCliArgs(argv).action).toEqual(expected);
    });

    it('passes -p to --config-set-model', () => {
      expect(parseCliArgs(['--config-set-model', 'sonnet', '-p', 'claude']).action).toEqual({
        kind: 'config-set-model',
        model: 'sonnet',
        provider: 'claude',
      });
    });

    it('lets --help win over other commands', () => {
      expect(parseCliArgs(['--list-providers', '--help']).action).toEqual({ kind: 'help' });
    });

    it('rejects two commands at once', () => {
      expect(() => parseCliArgs(['--config-show', '--config-path'])).toThrow(
        'Only one command can be used at a time (got --config-show, --config-path)',
      );
    });

    it('rejects a command combined with a question', () => {
      expect(() => parseCliArgs(['--list-providers', 'hello'])).toThrow(
        '--list-providers cannot be combined with a question',
      );
    });

    it('rejects --dry-run with a command', () => {
      expect(() => parseCliArgs(['--dry-run', '--config-reset'])).toThrow(
        '--dry-run cannot be used with --config-reset',
      );
    });

    it('rejects a blank --list-models value', () => {
      expect(() => parseCliArgs(['--list-models', '  '])).toThrow(
        '--list-models requires a non-empty value',
      );
    });
  });

  describe('invalid options', () => {
    it('turns unknown options into UsageError', () => {
      expect(() => parseCliArgs(['--bogus', 'q'])).toThrow(UsageError);
    });

    it('turns a missing option value into UsageError', () => {
      expect(() => parseCliArgs(['q', '-p'])).toThrow(UsageError);
    });

    it('rejects --model with a command', () => {
      expect(() =>
        parseCliArgs(['--config-set-provider', 'claude', '-m', 'opus']),
      ).toThrow(new UsageError('--model cannot be used with --config-set-provider'));
    });

    it('rejects --model with --config-set-model', () => {
      expect(() =>
        parseCliArgs(['--config-set-model', 'opus', '--model', 'sonnet']),
      ).toThrow(new UsageError('--model cannot be used with --config-set-model'));
    });

    it('rejects --provider with commands other than --config-set-model', () => {
      expect(() => parseCliArgs(['--list-providers', '-p', 'claude'])).toThrow(
        new UsageError('--provider cannot be used with --list-providers'),
      );
    });

    it('turns a missing --list-models value into UsageError', () => {
      expect(() => parseCliArgs(['--list-models'])).toThrow(UsageError);
    });
  });
});
