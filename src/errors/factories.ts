import type {
  AppError,
  ConfigError,
  ConfigIssue,
  IOError,
  NotFoundError,
  ParseError,
  UnsupportedPlatformError,
} from './app-error.js';
import type { Platform } from '../domain/platform.js';
import { formatPlatform } from '../domain/platform.js';
import type { FsError } from '../ports/fs.port.js';

export const Err = {
  variableNotSet: (variable: string): ConfigError => ({
    _tag: 'ConfigError',
    variable,
    issues: [],
    message: `${variable} is not set`,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigError => ({
    _tag: 'ConfigError',
    variable: '(environment)',
    issues,
    message: 'Invalid configuration',
  }),

  io: (operation: IOError['operation'], path: string, cause: FsError): IOError => ({
    _tag: 'IOError',
    operation,
    path,
    code: cause.code,
    message: `${operation}(${path}) failed: ${cause.message}`,
  }),

  notADirectory: (path: string): IOError => ({
    _tag: 'IOError',
    operation: 'Stat',
    path,
    code: 'NOT_A_DIRECTORY',
    message: `${path} is not a directory`,
  }),

  parse: (source: string, details: string): ParseError => ({
    _tag: 'ParseError',
    source,
    details,
    message: `Failed to parse ${source}: ${details}`,
  }),

  toolNotFound: (name: string): NotFoundError => ({
    _tag: 'NotFoundError',
    kind: 'tool',
    name,
    message: `tool "${name}" not found in the manifest`,
  }),

  projectNotFound: (name: string): NotFoundError => ({
    _tag: 'NotFoundError',
    kind: 'project',
    name,
    message: `project "${name}" not found in the manifest`,
  }),

  unsupportedPlatform: (platform: Platform): UnsupportedPlatformError => ({
    _tag: 'UnsupportedPlatform',
    platform,
    message: `unsupported platform ${formatPlatform(platform)}`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
