/**
 * The query command: resolve, build, then run (or only show) the command.
 */

import { buildCommand } from '../../command.js';
import type { ConfigStore } from '../../config.js';
import { NonZeroExitError } from '../../errors.js';
import type { Invoker } from '../../invoker.js';
import type { Logger } from '../../logger.js';
import type { ProviderRegistry } from '../../providers/registry.js';
import { resolveRequest, type QueryArgs } from '../../request.js';
import { errorln, println, writeCaptured } from './output.js';

export interface AskDeps {
  store: ConfigStore;
  registry: ProviderRegistry;
  invoker: Invoker;
  logger: Logger;
}

export async function runAskCommand(query: QueryArgs, deps: AskDeps): Promise<void> {
  const config = await deps.store.load();
  const request = resolveRequest(query, config, deps.registry);
  deps.logger.debug(
    `resolved provider=${request.provider.key} model=${request.model} `
    + `maxResponseWords=${request.maxResponseWords}`,
  );

  const command = buildCommand(request);
  if (request.verbose) {
    errorln(`Command: ${command.display}`);
  }

  try {
    const result = await deps.invoker.run(command, { dryRun: request.dryRun });
    if (result.kind === 'dry-run') {
      println(result.display);
      return;
    }
    writeCaptured(process.stdout, result.stdout);
    writeCaptured(process.stderr, result.stderr);
  }
  catch (err) {
    if (err instanceof NonZeroExitError) {
      writeCaptured(process.stdout, err.stdout);
      writeCaptured(process.stderr, err.stderr);
    }
    throw err;
  }
}
