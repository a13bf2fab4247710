/**
 * Configuration commands.
 *
 *   --config-path          Show the config file path
 *   --config-show          Show the effective configuration
 *   --config-reset         Rewrite the config file with the defaults
 *   --config-set-provider  Change the default provider
 *   --config-set-model     Change the default model of a provider
 */

import {
  defaultConfig,
  effectiveConfig,
  type ConfigStore,
  type PersistedConfig,
} from '../../config.js';
import { resolveProviderModel } from '../../providers/aliases.js';
import type { ProviderRegistry } from '../../providers/registry.js';
import { println } from './output.js';

function formatConfig(config: PersistedConfig): string {
  return JSON.stringify(config, null, 2);
}

export function runConfigPathCommand(store: ConfigStore): void {
  println(store.path);
}

export async function runConfigShowCommand(store: ConfigStore): Promise<void> {
  const config = effectiveConfig(await store.load());
  println(formatConfig(config));
}

/** Works even when the current file is invalid: it is never read. */
export async function runConfigResetCommand(store: ConfigStore): Promise<void> {
  const config = defaultConfig();
  await store.save(config);
  println('Configuration reset to defaults');
  println(formatConfig(config));
}

export async function runConfigSetProviderCommand(
  store: ConfigStore,
  registry: ProviderRegistry,
  providerKey: string,
): Promise<void> {
  const provider = registry.requireAvailable(providerKey);
  const config = effectiveConfig(await store.load());
  await store.save({ ...config, default_provider: provider.key });
  println(`Default provider set to ${provider.key}`);
}

/**
 * Store the canonical form of `model` as the default of a provider
 * (`providerKey`, or the configured default provider).
 */
export async function runConfigSetModelCommand(
  store: ConfigStore,
  registry: ProviderRegistry,
  model: string,
  providerKey?: string,
): Promise<void> {
  const config = effectiveConfig(await store.load());
  const provider = registry.requireAvailable(providerKey ?? config.default_provider);
  const canonical = resolveProviderModel(provider, model);
  await store.save({
    ...config,
    default_models: { ...config.default_models, [provider.key]: canonical },
  });
  println(`Default model for ${provider.key} set to ${canonical}`);
}
