/**
 * Executable lookup on PATH, used to show which provider CLIs are installed.
 *
 * Iterates over `$PATH` directories and checks for an executable file
 * without spawning a subprocess.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export function isCommandAvailable(command: string): boolean {
  const pathEnv = process.env.PATH ?? '';
  const dirs = pathEnv.split(path.delimiter).filter(dir => dir !== '');
  for (const dir of dirs) {
    try {
      const fullPath = path.join(dir, command);
      const stat = fs.statSync(fullPath);
      if (stat.isFile()) {
        fs.accessSync(fullPath, fs.constants.X_OK);
        return true;
      }
    }
    catch {
      // Not found in this directory
    }
  }
  return false;
}
