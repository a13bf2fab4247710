/**
 * Built-in provider catalog.
 *
 * Only `claude` is wired up; the others are declared so that users get a
 * "coming in a future release" message instead of "unknown provider".
 */

import type { Provider } from './types.js';

const HAIKU = 'claude-haiku-4-5-20251001';
const SONNET = 'claude-sonnet-4-5-20250929';
const OPUS = 'claude-opus-4-1-20250805';

const claude: Provider = {
  key: 'claude',
  displayName: 'Claude Code CLI',
  models: [HAIKU, SONNET, OPUS],
  defaultModel: HAIKU,
  aliases: new Map([
    ['haiku', HAIKU],
    ['haiku-4', HAIKU],
    ['haiku-4-5', HAIKU],
    ['4-5-haiku', HAIKU],
    ['sonnet', SONNET],
    ['sonnet-4', SONNET],
    ['sonnet-4-5', SONNET],
    ['4-5-sonnet', SONNET],
    ['opus', OPUS],
    ['opus-4', OPUS],
    ['opus-4-1', OPUS],
    ['4-1-opus', OPUS],
  ]),
  // `--` keeps a prompt that starts with a dash from being read as an option.
  command: {
    executable: 'claude',
    args: [
      '--print',
      '--model',
      { slot: 'model' },
      '--append-system-prompt',
      { slot: 'instruction' },
      '--',
    ],
  },
  available: true,
  installHint: 'Install it with: npm install -g @anthropic-ai/claude-code',
};

const gemini: Provider = {
  key: 'gemini',
  displayName: 'Gemini CLI',
  models: ['gemini-2.5-flash', 'gemini-2.5-pro'],
  defaultModel: 'gemini-2.5-flash',
  aliases: new Map([
    ['flash', 'gemini-2.5-flash'],
    ['gemini-flash', 'gemini-2.5-flash'],
    ['pro', 'gemini-2.5-pro'],
    ['gemini-pro', 'gemini-2.5-pro'],
  ]),
  command: {
    executable: 'gemini',
    args: ['--model', { slot: 'model' }, '--prompt'],
  },
  available: false,
  installHint: 'Install it with: npm install -g @google/gemini-cli',
};

const openai: Provider = {
  key: 'openai',
  displayName: 'Codex CLI',
  models: ['gpt-5-codex', 'gpt-5'],
  defaultModel: 'gpt-5-codex',
  aliases: new Map([
    ['codex', 'gpt-5-codex'],
    ['gpt5', 'gpt-5'],
  ]),
  command: {
    executable: 'codex',
    args: ['exec', '--model', { slot: 'model' }, '--'],
  },
  available: false,
  installHint: 'Install it with: npm install -g @openai/codex',
};

export const BUILTIN_PROVIDERS: readonly Provider[] = [claude, gemini, openai];
