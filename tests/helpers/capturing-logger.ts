import pino from 'pino';
import type { Logger } from '../../src/core/logging/index.js';

/**
 * A real pino logger whose output is parsed back into objects instead of
 * written anywhere. Fakes over mocks: assert on what was logged.
 */
export interface CapturedLog {
  readonly level: number;
  readonly msg?: string;
  readonly [key: string]: unknown;
}

export const PINO_LEVELS = { debug: 20, info: 30, warn: 40, error: 50 } as const;

export interface CapturingLogger {
  readonly logger: Logger;
  readonly entries: CapturedLog[];
}

export function createCapturingLogger(bindings: Record<string, unknown> = {}): CapturingLogger {
  const entries: CapturedLog[] = [];
  const logger = pino(
    { level: 'trace', base: bindings },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    }
  );
  return { logger, entries };
}
