/**
 * Merge persisted configuration with CLI overrides into one request.
 *
 * Priority: CLI flags > config file > built-in fallback (claude / haiku).
 * The word limit comes only from the config file (default: 100).
 */

import {
  DEFAULT_MAX_RESPONSE_WORDS,
  type Config,
} from './config.js';
import { resolveProviderModel } from './providers/aliases.js';
import { normalizeKey, type ProviderRegistry } from './providers/registry.js';
import type { Provider } from './providers/types.js';

export const FALLBACK_PROVIDER = 'claude';
export const FALLBACK_MODEL = 'haiku';

/** Query options taken from the command line. */
export interface QueryArgs {
  prompt: string;
  provider?: string;
  model?: string;
  verbose: boolean;
  dryRun: boolean;
}

export interface ResolvedRequest {
  provider: Provider;
  /** Canonical model identifier. */
  model: string;
  prompt: string;
  maxResponseWords: number;
  verbose: boolean;
  dryRun: boolean;
}

/** Persisted model for a provider; keys match after normalization. */
function configuredModel(config: Config, providerKey: string): string | undefined {
  const models = config.default_models ?? {};
  return models[providerKey]
    ?? Object.entries(models).find(([key]) => normalizeKey(key) === providerKey)?.[1];
}

/**
 * Resolve provider and model for one invocation.
 *
 * @throws UnknownProviderError, ProviderUnavailableError, UnknownModelError
 */
export function resolveRequest(
  args: QueryArgs,
  config: Config,
  registry: ProviderRegistry,
): ResolvedRequest {
  const providerKey
    = args.provider ?? config.default_provider ?? FALLBACK_PROVIDER;
  const provider = registry.requireAvailable(providerKey);

  const modelInput
    = args.model
      ?? configuredModel(config, provider.key)
      ?? (provider.key === FALLBACK_PROVIDER ? FALLBACK_MODEL : provider.defaultModel);

  return {
    provider,
    model: resolveProviderModel(provider, modelInput),
    prompt: args.prompt,
    maxResponseWords: config.max_response_words ?? DEFAULT_MAX_RESPONSE_WORDS,
    verbose: args.verbose,
    dryRun: args.dryRun,
  };
}
