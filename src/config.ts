/**
 * Configuration file loading, validation and persistence for askai.
 *
 * Supports XDG Base Directory specification for config file placement:
 *   $XDG_CONFIG_HOME/askai/config.json
 *   (default: ~/.config/askai/config.json)
 *
 * Every key is optional in the file; missing keys take the defaults.
 * Writes always replace the whole file.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigInvalidError } from './errors.js';
import { normalizeKey } from './providers/registry.js';

/** Word limit used when the config file does not set a valid one. */
export const DEFAULT_MAX_RESPONSE_WORDS = 100;

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function normalizeModelKeys(models: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(models).map(([key, model]) => [normalizeKey(key), model]),
  );
}

/** Drop a `max_response_words` that is not a positive integer. */
function dropInvalidWordLimit(json: unknown): unknown {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return json;
  }
  if ('max_response_words' in json && !isPositiveInteger(json.max_response_words)) {
    const { max_response_words: _dropped, ...rest } = json;
    return rest;
  }
  return json;
}

export const ConfigSchema = z.preprocess(
  dropInvalidWordLimit,
  z
    .object({
      /** Provider used when -p/--provider is not given. */
      default_provider: z.string().min(1).optional(),

      /** Provider key → model alias or canonical identifier. Keys are lowercased. */
      default_models: z
        .record(z.string(), z.string().min(1))
        .transform(normalizeModelKeys)
        .optional(),

      /**
       * Advisory answer length passed to the model (default: 100).
       * A value that is not a positive integer is treated as absent.
       */
      max_response_words: z.number().int().positive().optional(),
    })
    .strict(),
);

export type Config = z.infer<typeof ConfigSchema>;

/** Fully populated configuration, as written back to disk. */
export interface PersistedConfig {
  default_provider: string;
  default_models: Record<string, string>;
  max_response_words: number;
}

export function defaultConfig(): PersistedConfig {
  return {
    default_provider: 'claude',
    default_models: {
      claude: 'haiku',
      gemini: 'gemini-flash',
    },
    max_response_words: DEFAULT_MAX_RESPONSE_WORDS,
  };
}

/**
 * Merge a loaded config over the defaults.
 *
 * `default_models` is merged key by key; other keys are replaced.
 */
export function effectiveConfig(config: Config): PersistedConfig {
  const defaults = defaultConfig();
  return {
    default_provider: config.default_provider ?? defaults.default_provider,
    default_models: { ...defaults.default_models, ...config.default_models },
    max_response_words:
      config.max_response_words ?? defaults.max_response_words,
  };
}

/**
 * Return the default config file path following XDG Base Directory spec.
 *
 * Uses $XDG_CONFIG_HOME if set, otherwise falls back to ~/.config.
 */
export function getDefaultConfigPath(): string {
  const xdgConfigHome
    = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'askai', 'config.json');
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Load and validate a config file.
 *
 * A missing file returns an empty config. Read errors, JSON parse errors
 * and schema validation errors throw ConfigInvalidError.
 */
export async function loadConfig(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  }
  catch (err) {
    if (!isNodeError(err)) throw err;
    if (err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigInvalidError(filePath, `cannot be read (${err.code ?? err.message})`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  }
  catch {
    throw new ConfigInvalidError(filePath, 'not valid JSON');
  }

  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigInvalidError(filePath, result.error.message);
  }
  return result.data;
}

/** Write the full config, creating the directory. The file is user-only (0600). */
export async function saveConfig(
  filePath: string,
  config: PersistedConfig,
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(
    filePath,
    `${JSON.stringify(config, null, 2)}\n`,
    { encoding: 'utf-8', mode: 0o600 },
  );
  // mode only applies when the file is created
  await fs.promises.chmod(filePath, 0o600);
}

/** Storage collaborator for the persisted configuration. */
export interface ConfigStore {
  readonly path: string;
  load: () => Promise<Config>;
  save: (config: PersistedConfig) => Promise<void>;
}

export class FileConfigStore implements ConfigStore {
  readonly path: string;

  constructor(filePath: string = getDefaultConfigPath()) {
    this.path = filePath;
  }

  async load(): Promise<Config> {
    return loadConfig(this.path);
  }

  async save(config: PersistedConfig): Promise<void> {
    await saveConfig(this.path, config);
  }
}
