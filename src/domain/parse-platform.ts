import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { ParseError } from '../errors/index.js';
import { Err } from '../errors/index.js';
import type { Platform } from './platform.js';

const IDENTIFIER = /^[a-z0-9_]+$/;
const ARM_WITH_REVISION = /^arm(v\d+)$/;

/**
 * Parses `<arch>[v<rev>]-<os>`: `amd64-linux`, `arm-linux`, `armv7-android`,
 * `amd64p32-nacl`. Only `arm` takes a revision suffix.
 */
export function parsePlatform(text: string): Result<Platform, ParseError> {
  const parts = text.split('-');
  if (parts.length !== 2) {
    return err(Err.parse(`platform "${text}"`, 'expected <arch>-<os>'));
  }

  const [archPart = '', os = ''] = parts;
  if (!IDENTIFIER.test(archPart) || !IDENTIFIER.test(os)) {
    return err(Err.parse(`platform "${text}"`, 'arch and os must be lowercase identifiers'));
  }

  const revision = ARM_WITH_REVISION.exec(archPart)?.[1];
  if (revision !== undefined) {
    return ok({ arch: 'arm', os, subArch: revision });
  }
  return ok({ arch: archPart, os });
}
