import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { UnsupportedPlatformError } from '../errors/index.js';
import { Err } from '../errors/index.js';
import type { HostPlatform, Platform } from './platform.js';
import { isHost } from './platform.js';

/**
 * The closed set of build targets the resolver knows how to configure.
 * Order of recognition matters: a platform equal to the host is `host`
 * even when it is also, say, arm/linux.
 */
export type PlatformTarget =
  | { readonly kind: 'host' }
  | { readonly kind: 'arm_linux'; readonly platform: Platform }
  | { readonly kind: 'arm_android'; readonly platform: Platform }
  | { readonly kind: 'nacl'; readonly platform: Platform };

const NACL_ARCHES: readonly string[] = ['386', 'amd64p32'];

export function classifyPlatform(
  platform: Platform,
  host: HostPlatform
): Result<PlatformTarget, UnsupportedPlatformError> {
  if (isHost(platform, host)) return ok({ kind: 'host' });
  if (platform.arch === 'arm' && platform.os === 'linux') return ok({ kind: 'arm_linux', platform });
  if (platform.arch === 'arm' && platform.os === 'android') return ok({ kind: 'arm_android', platform });
  if (NACL_ARCHES.includes(platform.arch) && platform.os === 'nacl') return ok({ kind: 'nacl', platform });
  return err(Err.unsupportedPlatform(platform));
}

/** `v7` -> `7`; a missing revision becomes the empty string. */
export function goArm(platform: Platform): string {
  const subArch = platform.subArch ?? '';
  return subArch.startsWith('v') ? subArch.slice(1) : subArch;
}
