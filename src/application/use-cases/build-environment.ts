import * as path from 'path';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { AppError, IOError } from '../../errors/index.js';
import { Err, errorFields } from '../../errors/index.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';
import { EnvSnapshot } from '../../env/snapshot.js';
import type { ToolContext } from '../../domain/context.js';
import type { HostPlatform, Platform } from '../../domain/platform.js';
import { formatPlatform } from '../../domain/platform.js';
import type { PlatformTarget } from '../../domain/platform-target.js';
import { classifyPlatform, goArm } from '../../domain/platform-target.js';
import type { RootPath } from '../../domain/root.js';
import { resolveRoot } from '../../domain/root.js';
import type { ToolsConfig } from '../../domain/tools-config.js';
import { loadToolsConfig } from './load-tools-config.js';

const PATH_SEPARATOR = ':';
const FLAGS_SEPARATOR = ' ';

export interface BuildEnvironmentDeps {
  readonly host: HostPlatform;
  readonly logger: Logger;
}

/**
 * Build environment for `platform`: the context's environment plus
 * workspace search paths, native-library flags and cross-compilation
 * variables.
 *
 * The platform is classified before anything is written, so an unsupported
 * platform fails without touching the snapshot. `ctx.env` is only read.
 */
export function buildEnvironment(
  ctx: ToolContext,
  platform: Platform,
  deps: BuildEnvironmentDeps
): Result<EnvSnapshot, AppError> {
  const log = deps.logger.child({ platform: formatPlatform(platform) });

  const result = resolveRoot(ctx).andThen((root) =>
    loadToolsConfig(ctx).andThen((config) =>
      classifyPlatform(platform, deps.host).andThen((target): Result<EnvSnapshot, AppError> => {
        const env = new EnvSnapshot(ctx.env);
        setGoPath(env, root, config);
        setVdlPath(env, root, config);
        log.debug({ root, gopath: env.get('GOPATH'), vdlpath: env.get('VDLPATH') }, 'Workspace paths set');

        if (platform.os === 'darwin' || platform.os === 'linux') {
          const cgo = setNativeLibraryEnv(ctx, env, root, platform.os);
          if (cgo.isErr()) return err(cgo.error);
        }

        applyTarget(env, root, target);
        log.debug({ target: target.kind, delta: env.delta() }, 'Environment resolved');
        return ok(env);
      })
    )
  );

  if (result.isErr()) {
    log.warn(errorFields(result.error), result.error.message);
  }
  return result;
}

function applyTarget(env: EnvSnapshot, root: RootPath, target: PlatformTarget): void {
  switch (target.kind) {
    case 'host':
      return;
    case 'arm_linux':
      env.set('GOARCH', target.platform.arch);
      env.set('GOARM', goArm(target.platform));
      env.set('GOOS', target.platform.os);
      prependPath(env, [
        path.join(root, 'third_party', 'cout', 'xgcc', 'cross_arm'),
        path.join(root, 'third_party', 'repos', 'go_arm', 'bin'),
      ]);
      return;
    case 'arm_android':
      env.set('CGO_ENABLED', '1');
      env.set('GOOS', target.platform.os);
      env.set('GOARCH', target.platform.arch);
      env.set('GOARM', goArm(target.platform));
      prependPath(env, [path.join(root, 'environment', 'android', 'go', 'bin')]);
      return;
    case 'nacl':
      env.set('GOARCH', target.platform.arch);
      env.set('GOOS', target.platform.os);
      return;
    default:
      assertNever(target);
  }
}

/** Cross toolchains go first so they shadow host binaries. */
function prependPath(env: EnvSnapshot, entries: readonly string[]): void {
  env.setTokens('PATH', [...entries, ...env.getTokens('PATH', PATH_SEPARATOR)], PATH_SEPARATOR);
}

function setGoPath(env: EnvSnapshot, root: RootPath, config: ToolsConfig): void {
  const gopath = env.getTokens('GOPATH', PATH_SEPARATOR);
  for (const workspace of config.goWorkspaces()) {
    gopath.push(path.join(root, workspace));
  }
  env.setTokens('GOPATH', gopath, PATH_SEPARATOR);
}

function setVdlPath(env: EnvSnapshot, root: RootPath, config: ToolsConfig): void {
  const vdlpath = env.getTokens('VDLPATH', PATH_SEPARATOR);
  for (const workspace of config.vdlWorkspaces()) {
    vdlpath.push(path.join(root, workspace));
  }
  env.setTokens('VDLPATH', vdlpath, PATH_SEPARATOR);
}

/**
 * Enables cgo and points it at the bundled LevelDB build when one exists
 * under `third_party/cout/leveldb`. Linux additionally gets an rpath.
 */
function setNativeLibraryEnv(
  ctx: ToolContext,
  env: EnvSnapshot,
  root: RootPath,
  os: 'darwin' | 'linux'
): Result<void, IOError> {
  env.set('CGO_ENABLED', '1');
  const cflags = env.getTokens('CGO_CFLAGS', FLAGS_SEPARATOR);
  const ldflags = env.getTokens('CGO_LDFLAGS', FLAGS_SEPARATOR);
  const dir = path.join(root, 'third_party', 'cout', 'leveldb');

  const stat = ctx.fs.stat(dir);
  if (stat.isErr()) {
    if (stat.error.code !== 'FS_NOT_FOUND') return err(Err.io('Stat', dir, stat.error));
  } else {
    cflags.push(`-I${path.join(dir, 'include')}`);
    ldflags.push(`-L${path.join(dir, 'lib')}`);
    if (os === 'linux') {
      ldflags.push('-Wl,-rpath', path.join(dir, 'lib'));
    }
  }

  env.setTokens('CGO_CFLAGS', cflags, FLAGS_SEPARATOR);
  env.setTokens('CGO_LDFLAGS', ldflags, FLAGS_SEPARATOR);
  return ok(undefined);
}
