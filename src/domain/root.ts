import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { ConfigError, IOError } from '../errors/index.js';
import { Err } from '../errors/index.js';
import type { RootContext } from './context.js';

export const ROOT_ENV = 'V23_ROOT';

/** Canonical (symlink-free) path of an existing root directory. */
export type RootPath = Brand<string, 'RootPath'>;

export type RootError = ConfigError | IOError;

export function resolveRoot(ctx: RootContext): Result<RootPath, RootError> {
  const root = ctx.env[ROOT_ENV];
  if (root === undefined || root === '') {
    return err(Err.variableNotSet(ROOT_ENV));
  }

  return ctx.fs
    .realpath(root)
    .mapErr((e): RootError => Err.io('EvalSymlinks', root, e))
    .andThen((canonical) =>
      ctx.fs
        .stat(canonical)
        .mapErr((e): RootError => Err.io('Stat', canonical, e))
        .andThen((stat): Result<RootPath, RootError> => (stat.isDirectory ? ok(canonical as RootPath) : err(Err.notADirectory(canonical))))
    );
}
