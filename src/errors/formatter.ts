import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigError': {
      if (error.issues.length === 0) return error.message;
      const issues = error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n');
      return `${error.message}\n\n${issues}`;
    }

    case 'IOError':
    case 'ParseError':
    case 'NotFoundError':
    case 'UnsupportedPlatform':
      return error.message;

    default:
      return assertNever(error);
  }
}

/** Structured fields for `logger.warn({ ...errorFields(e) }, ...)`. */
export function errorFields(error: AppError): Record<string, unknown> {
  switch (error._tag) {
    case 'ConfigError':
      return { tag: error._tag, variable: error.variable, issues: error.issues };
    case 'IOError':
      return { tag: error._tag, operation: error.operation, path: error.path, code: error.code };
    case 'ParseError':
      return { tag: error._tag, source: error.source };
    case 'NotFoundError':
      return { tag: error._tag, kind: error.kind, name: error.name };
    case 'UnsupportedPlatform':
      return { tag: error._tag, platform: error.platform };
    default:
      return assertNever(error);
  }
}
