import type { Brand } from '../runtime/brand.js';
import type { Platform } from '../domain/platform.js';
import type { FsError } from '../ports/fs.port.js';

/**
 * Error taxonomy for environment resolution.
 *
 * Errors are data: returned in a `Result`, never thrown across a module
 * boundary. Each carries a human-readable `message` with the failing path or
 * operation already in it; the CLI prints it verbatim.
 */

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

/** A required input is unset, empty or invalid. */
export type ConfigError = Readonly<{
  readonly _tag: 'ConfigError';
  readonly variable: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** A filesystem read, stat or symlink resolution failed. */
export type IOError = Readonly<{
  readonly _tag: 'IOError';
  readonly operation: 'ReadFile' | 'Stat' | 'EvalSymlinks';
  readonly path: string;
  readonly code: FsError['code'] | 'NOT_A_DIRECTORY';
  readonly message: string;
}>;

/** Content could not be parsed or does not have the expected shape. */
export type ParseError = Readonly<{
  readonly _tag: 'ParseError';
  readonly source: string;
  readonly details: string;
  readonly message: string;
}>;

/** A tool or project is missing from the project/tool registry. */
export type NotFoundError = Readonly<{
  readonly _tag: 'NotFoundError';
  readonly kind: 'tool' | 'project';
  readonly name: string;
  readonly message: string;
}>;

export type UnsupportedPlatformError = Readonly<{
  readonly _tag: 'UnsupportedPlatform';
  readonly platform: Platform;
  readonly message: string;
}>;

export type AppError = ConfigError | IOError | ParseError | NotFoundError | UnsupportedPlatformError;

export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
