#!/usr/bin/env node
/**
 * CLI entry point for askai.
 */

import { CliError } from './commands/output.js';
import { runCli } from './main.js';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(error.message);
    process.exitCode = error.exitCode;
    return;
  }
  console.error(
    `fatal: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
