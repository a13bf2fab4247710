/**
 * Provider registry: immutable lookup over the provider catalog.
 *
 * Built once from a fixed list; there is no runtime registration.
 * Lookups normalize the key (trim, lowercase).
 */

import {
  ProviderUnavailableError,
  UnknownProviderError,
} from '../errors.js';
import { BUILTIN_PROVIDERS } from './catalog.js';
import type { Provider } from './types.js';

export interface ProviderRegistry {
  listProviders: () => readonly Provider[];
  /** Throws UnknownProviderError. Unavailable providers are returned. */
  getProvider: (key: string) => Provider;
  listModels: (key: string) => readonly string[];
  /** Like getProvider, but throws ProviderUnavailableError for unavailable providers. */
  requireAvailable: (key: string) => Provider;
}

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function validateProvider(provider: Provider): void {
  if (provider.key !== normalizeKey(provider.key) || provider.key === '') {
    throw new Error(`Provider key must be non-empty lowercase: '${provider.key}'`);
  }
  if (provider.models.length === 0) {
    throw new Error(`Provider '${provider.key}' declares no models`);
  }
  if (!provider.models.includes(provider.defaultModel)) {
    throw new Error(
      `Default model '${provider.defaultModel}' of provider '${provider.key}' is not in its model list`,
    );
  }
  for (const [alias, target] of provider.aliases) {
    if (alias !== normalizeKey(alias)) {
      throw new Error(`Alias '${alias}' of provider '${provider.key}' must be lowercase`);
    }
    if (!provider.models.includes(target)) {
      throw new Error(
        `Alias '${alias}' of provider '${provider.key}' points at unknown model '${target}'`,
      );
    }
  }
}

function freezeProvider(provider: Provider): Provider {
  return Object.freeze({
    ...provider,
    models: Object.freeze([...provider.models]),
    aliases: new Map(provider.aliases),
    command: Object.freeze({
      executable: provider.command.executable,
      args: Object.freeze([...provider.command.args]),
    }),
  });
}

/**
 * Build a registry from a provider list.
 *
 * @throws if keys collide, or a default model or alias target is not a
 *         canonical model of its provider.
 */
export function createProviderRegistry(
  providers: readonly Provider[],
): ProviderRegistry {
  const byKey = new Map<string, Provider>();
  for (const provider of providers) {
    validateProvider(provider);
    if (byKey.has(provider.key)) {
      throw new Error(`Duplicate provider key '${provider.key}'`);
    }
    byKey.set(provider.key, freezeProvider(provider));
  }
  const ordered = Object.freeze([...byKey.values()]);
  const keys = Object.freeze([...byKey.keys()]);

  const getProvider = (key: string): Provider => {
    const provider = byKey.get(normalizeKey(key));
    if (provider === undefined) {
      throw new UnknownProviderError(key, keys);
    }
    return provider;
  };

  return {
    listProviders: () => ordered,
    getProvider,
    listModels: key => getProvider(key).models,
    requireAvailable: (key) => {
      const provider = getProvider(key);
      if (!provider.available) {
        throw new ProviderUnavailableError(provider.key);
      }
      return provider;
    },
  };
}

export const defaultRegistry: ProviderRegistry
  = createProviderRegistry(BUILTIN_PROVIDERS);
