/**
 * Public API for askai.
 *
 * Re-exports the provider catalog, resolution and command-construction
 * modules for programmatic use.
 */

export { buildCommand, CommandSpec, MAX_PROMPT_LENGTH, type BuiltCommand } from './command.js';
export {
  ConfigSchema,
  defaultConfig,
  effectiveConfig,
  FileConfigStore,
  getDefaultConfigPath,
  loadConfig,
  saveConfig,
  type Config,
  type ConfigStore,
  type PersistedConfig,
} from './config.js';
export * from './errors.js';
export {
  Invoker,
  spawnRunner,
  type ExecutionResult,
  type InvokerOptions,
  type ProcessOutcome,
  type ProcessRunner,
} from './invoker.js';
export type { Logger } from './logger.js';
export { listAliases, resolveModel, resolveProviderModel } from './providers/aliases.js';
export { BUILTIN_PROVIDERS } from './providers/catalog.js';
export {
  createProviderRegistry,
  defaultRegistry,
  type ProviderRegistry,
} from './providers/registry.js';
export type { CommandTemplate, Provider, TemplateArg } from './providers/types.js';
export { resolveRequest, type QueryArgs, type ResolvedRequest } from './request.js';
