import type { Logger } from './types.js';
import { createRootLogger, logLevelFromEnv } from './create-logger.js';

/**
 * Logger for code that runs before the container is initialised
 * (argument parsing, container setup itself).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(logLevelFromEnv(process.env));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
