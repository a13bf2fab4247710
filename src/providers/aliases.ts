/**
 * Model alias resolution.
 *
 * Input is normalized (trim, lowercase) and matched against the provider's
 * canonical models first, then its alias table. Anything else is an
 * UnknownModelError listing the canonical models; there is no fallback.
 */

import { UnknownModelError } from '../errors.js';
import { normalizeKey, type ProviderRegistry } from './registry.js';
import type { Provider } from './types.js';

/** Resolve a model string within one provider. */
export function resolveProviderModel(provider: Provider, input: string): string {
  const normalized = normalizeKey(input);

  const canonical = provider.models.find(
    model => model.toLowerCase() === normalized,
  );
  if (canonical !== undefined) return canonical;

  const aliased = provider.aliases.get(normalized);
  if (aliased !== undefined) return aliased;

  throw new UnknownModelError(provider.key, input, provider.models);
}

/** Resolve a model string for a provider key. */
export function resolveModel(
  registry: ProviderRegistry,
  providerKey: string,
  input: string,
): string {
  return resolveProviderModel(registry.getProvider(providerKey), input);
}

/** Aliases that resolve to `model`, in table order. */
export function listAliases(provider: Provider, model: string): string[] {
  const aliases: string[] = [];
  for (const [alias, target] of provider.aliases) {
    if (target === model) aliases.push(alias);
  }
  return aliases;
}
