import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';

/**
 * BUILDENV_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. stdout belongs to the printed environment.
 */
export function logLevelFromEnv(env: Record<string, string | undefined>): LogLevel {
  const level = env['BUILDENV_LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'silent';
}

export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // stderr, synchronous: output is interleaved with `env` lines on stdout
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
