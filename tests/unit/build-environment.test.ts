import { describe, it, expect } from 'vitest';
import { buildEnvironment } from '../../src/application/use-cases/build-environment.js';
import type { HostPlatform, Platform } from '../../src/domain/platform.js';
import type { EnvRecord } from '../../src/env/snapshot.js';
import { createCapturingLogger, PINO_LEVELS } from '../helpers/capturing-logger.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { LEVELDB, makeContext, makeTree } from '../helpers/tree-fixture.js';
import type { InMemoryFileSystem } from '../helpers/in-memory-fs.js';

const LINUX_HOST: HostPlatform = { os: 'linux', arch: 'amd64' };

const BASE_ENV: EnvRecord = {
  V23_ROOT: '/v23',
  PATH: '/usr/bin:/bin',
  GOPATH: '/home/dev/go',
  HOME: '/home/dev',
};

function build(platform: Platform, options: { fs?: InMemoryFileSystem; env?: EnvRecord; host?: HostPlatform } = {}) {
  const { logger, entries } = createCapturingLogger();
  const result = buildEnvironment(makeContext(options.fs ?? makeTree(), options.env ?? BASE_ENV), platform, {
    host: options.host ?? LINUX_HOST,
    logger,
  });
  return { result, entries };
}

describe('buildEnvironment', () => {
  describe('host platform', () => {
    it('appends workspaces and enables cgo, nothing else', () => {
      const env = expectOk(build({ os: 'linux', arch: 'amd64' }).result, 'host');

      expect(env.delta()).toEqual({
        GOPATH: '/home/dev/go:/v23/release/go',
        VDLPATH: '/v23/release/go/src',
        CGO_ENABLED: '1',
        CGO_CFLAGS: '',
        CGO_LDFLAGS: '',
      });
      expect(env.get('PATH')).toBe('/usr/bin:/bin');
      expect(env.get('HOME')).toBe('/home/dev');
    });

    it('appends each configured workspace after existing entries', () => {
      const fs = makeTree({ 'go-workspaces': ['release/go', 'roadmap/go'], 'vdl-workspaces': [] });
      const env = expectOk(build({ os: 'linux', arch: 'amd64' }, { fs }).result, 'two workspaces');

      expect(env.getTokens('GOPATH', ':')).toEqual(['/home/dev/go', '/v23/release/go', '/v23/roadmap/go']);
      expect(env.get('VDLPATH')).toBe('');
    });

    it('points cgo at the bundled LevelDB on linux, with an rpath', () => {
      const fs = makeTree().addDir(LEVELDB);
      const env = expectOk(build({ os: 'linux', arch: 'amd64' }, { fs }).result, 'leveldb');

      expect(env.get('CGO_CFLAGS')).toBe('-I/v23/third_party/cout/leveldb/include');
      expect(env.get('CGO_LDFLAGS')).toBe(
        '-L/v23/third_party/cout/leveldb/lib -Wl,-rpath /v23/third_party/cout/leveldb/lib'
      );
    });

    it('keeps existing flags and skips the rpath on darwin', () => {
      const fs = makeTree().addDir(LEVELDB);
      const darwin: HostPlatform = { os: 'darwin', arch: 'amd64' };
      const env = expectOk(
        build({ os: 'darwin', arch: 'amd64' }, { fs, host: darwin, env: { ...BASE_ENV, CGO_CFLAGS: '-O2' } }).result,
        'darwin'
      );

      expect(env.get('CGO_ENABLED')).toBe('1');
      expect(env.get('CGO_CFLAGS')).toBe('-O2 -I/v23/third_party/cout/leveldb/include');
      expect(env.get('CGO_LDFLAGS')).toBe('-L/v23/third_party/cout/leveldb/lib');
    });

    it('fails with IOError when the LevelDB directory cannot be inspected', () => {
      const fs = makeTree().failOn(LEVELDB, { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${LEVELDB}` });
      const error = expectErr(build({ os: 'linux', arch: 'amd64' }, { fs }).result, 'denied');

      expect(error).toMatchObject({ _tag: 'IOError', operation: 'Stat', path: LEVELDB, code: 'FS_PERMISSION_DENIED' });
    });
  });

  describe('arm / linux', () => {
    it('sets GOARCH, GOARM and GOOS', () => {
      const env = expectOk(build({ os: 'linux', arch: 'arm', subArch: 'v6' }).result, 'arm');

      expect(env.get('GOARCH')).toBe('arm');
      expect(env.get('GOARM')).toBe('6');
      expect(env.get('GOOS')).toBe('linux');
    });

    it('prepends the cross toolchain directories to PATH, in order', () => {
      const env = expectOk(build({ os: 'linux', arch: 'arm', subArch: 'v6' }).result, 'arm');

      expect(env.getTokens('PATH', ':')).toEqual([
        '/v23/third_party/cout/xgcc/cross_arm',
        '/v23/third_party/repos/go_arm/bin',
        '/usr/bin',
        '/bin',
      ]);
    });

    it('sets exactly the documented variables', () => {
      const env = expectOk(build({ os: 'linux', arch: 'arm', subArch: 'v6' }).result, 'arm');
      expect(Object.keys(env.delta()).sort()).toEqual([
        'CGO_CFLAGS',
        'CGO_ENABLED',
        'CGO_LDFLAGS',
        'GOARCH',
        'GOARM',
        'GOOS',
        'GOPATH',
        'PATH',
        'VDLPATH',
      ]);
    });
  });

  describe('arm / android', () => {
    it('strips the v from the revision and enables cgo', () => {
      const env = expectOk(build({ os: 'android', arch: 'arm', subArch: 'v7' }).result, 'android');

      expect(env.delta()).toEqual({
        GOPATH: '/home/dev/go:/v23/release/go',
        VDLPATH: '/v23/release/go/src',
        CGO_ENABLED: '1',
        GOOS: 'android',
        GOARCH: 'arm',
        GOARM: '7',
        PATH: '/v23/environment/android/go/bin:/usr/bin:/bin',
      });
    });

    it('creates PATH when it was unset', () => {
      const { PATH: _path, ...withoutPath } = BASE_ENV;
      const env = expectOk(build({ os: 'android', arch: 'arm', subArch: 'v7' }, { env: withoutPath }).result, 'no PATH');
      expect(env.get('PATH')).toBe('/v23/environment/android/go/bin');
    });
  });

  describe('nacl', () => {
    it.each(['386', 'amd64p32'])('sets only GOARCH and GOOS for %s', (arch) => {
      const env = expectOk(build({ os: 'nacl', arch }).result, arch);

      expect(env.delta()).toEqual({
        GOPATH: '/home/dev/go:/v23/release/go',
        VDLPATH: '/v23/release/go/src',
        GOARCH: arch,
        GOOS: 'nacl',
      });
    });
  });

  describe('failures', () => {
    it('rejects an unsupported platform without touching the input environment', () => {
      const input: Record<string, string | undefined> = { ...BASE_ENV };
      const { result, entries } = build({ os: 'windows', arch: 'arm64' }, { env: input });

      const error = expectErr(result, 'windows');
      expect(error._tag).toBe('UnsupportedPlatform');
      expect(error.message).toBe('unsupported platform arm64-windows');
      expect(input).toEqual(BASE_ENV);

      const warnings = entries.filter((e) => e.level === PINO_LEVELS.warn);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.msg).toBe('unsupported platform arm64-windows');
    });

    it('fails with ConfigError when V23_ROOT is unset', () => {
      const { V23_ROOT: _root, ...withoutRoot } = BASE_ENV;
      const error = expectErr(build({ os: 'linux', arch: 'amd64' }, { env: withoutRoot }).result, 'no root');

      expect(error._tag).toBe('ConfigError');
      expect(error.message).toBe('V23_ROOT is not set');
    });

    it('resolves a symlinked root before joining workspaces', () => {
      const fs = makeTree().addSymlink('/home/dev/v23', '/v23');
      const env = expectOk(
        build({ os: 'linux', arch: 'amd64' }, { fs, env: { ...BASE_ENV, V23_ROOT: '/home/dev/v23' } }).result,
        'symlink'
      );
      expect(env.get('VDLPATH')).toBe('/v23/release/go/src');
    });
  });

  it('logs the resolved delta at debug level', () => {
    const { entries } = build({ os: 'nacl', arch: '386' });
    const resolved = entries.find((e) => e.msg === 'Environment resolved');

    expect(resolved?.level).toBe(PINO_LEVELS.debug);
    expect(resolved?.['target']).toBe('nacl');
    expect(resolved?.['platform']).toBe('386-nacl');
  });
});
