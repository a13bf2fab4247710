/**
 * Information commands: --list-providers, --list-models, --version.
 */

import { createRequire } from 'node:module';
import { z } from 'zod';
import { listAliases } from '../../providers/aliases.js';
import type { ProviderRegistry } from '../../providers/registry.js';
import type { Provider } from '../../providers/types.js';
import { println } from './output.js';

const FUTURE_RELEASE = 'coming in a future release';

const packageJsonSchema = z.object({
  version: z.string(),
});

export function getVersion(): string {
  const require = createRequire(import.meta.url);
  const packageJson: unknown = require('../../../package.json');
  return packageJsonSchema.parse(packageJson).version;
}

export function runVersionCommand(): void {
  println(`askai ${getVersion()}`);
}

function describeProvider(
  provider: Provider,
  isAvailable: (executable: string) => boolean,
): string {
  if (!provider.available) {
    return `  ✗ ${provider.key} - ${provider.displayName} (${FUTURE_RELEASE})`;
  }
  const { executable } = provider.command;
  if (!isAvailable(executable)) {
    return `  ✗ ${provider.key} - ${provider.displayName} (${executable} not found in PATH)`;
  }
  return `  ✓ ${provider.key} - ${provider.displayName} (default: ${provider.defaultModel})`;
}

export function runListProvidersCommand(
  registry: ProviderRegistry,
  isAvailable: (executable: string) => boolean,
): void {
  println('Available providers:');
  for (const provider of registry.listProviders()) {
    println(describeProvider(provider, isAvailable));
  }
}

/** @throws UnknownProviderError */
export function runListModelsCommand(
  registry: ProviderRegistry,
  providerKey: string,
): void {
  const provider = registry.getProvider(providerKey);
  const suffix = provider.available ? '' : ` (${FUTURE_RELEASE})`;
  println(`Available models for ${provider.key}${suffix}:`);
  for (const model of registry.listModels(provider.key)) {
    const marker = model === provider.defaultModel ? ' (default)' : '';
    const aliases = listAliases(provider, model);
    const aliasText = aliases.length > 0 ? ` [aliases: ${aliases.join(', ')}]` : '';
    println(`  - ${model}${marker}${aliasText}`);
  }
}
