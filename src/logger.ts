/**
 * Logger interface for the askai core.
 *
 * The concrete implementation lives in the CLI layer.
 * Core modules depend only on this interface for dependency injection.
 */

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/** Logger that discards everything. Default when no logger is injected. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
