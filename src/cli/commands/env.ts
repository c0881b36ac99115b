/**
 * Env Command
 *
 * Prints the resolved build environment as `NAME="value"` lines.
 * Pure function: resolution and registry loading are injected.
 */

import type { Result } from 'neverthrow';
import type { AppError } from '../../errors/index.js';
import { formatAppError } from '../../errors/index.js';
import type { EnvSnapshot } from '../../env/snapshot.js';
import type { HostPlatform, Platform } from '../../domain/platform.js';
import { parsePlatform } from '../../domain/parse-platform.js';
import type { ProjectRegistry } from '../../domain/tools-config.js';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, successLines } from '../types/cli-result.js';

export interface EnvCommandDeps {
  readonly hostPlatform: HostPlatform;
  readonly loadRegistry: (filePath: string) => Result<ProjectRegistry, AppError>;
  readonly resolveEnvironment: (
    registry: ProjectRegistry,
    platform: Platform,
    toolName?: string
  ) => Result<EnvSnapshot, AppError>;
}

export interface EnvCommandOptions {
  readonly registry: string;
  readonly names: readonly string[];
  readonly platform?: string;
  readonly tool?: string;
  /** Only variables the resolution changed */
  readonly delta?: boolean;
}

/** Double-quoted for POSIX shells: `\`, `"`, `$` and backtick are escaped. */
export function formatEnvLine(name: string, value: string): string {
  return `${name}="${value.replace(/([\\"$`])/g, '\\$1')}"`;
}

export function executeEnvCommand(deps: EnvCommandDeps, options: EnvCommandOptions): CliResult {
  let platform: Platform = deps.hostPlatform;
  if (options.platform !== undefined) {
    const parsed = parsePlatform(options.platform);
    if (parsed.isErr()) {
      return misuse(parsed.error.message, ['Platforms look like amd64-linux, arm-linux or armv7-android']);
    }
    platform = parsed.value;
  }

  const resolved = deps
    .loadRegistry(options.registry)
    .andThen((registry) => deps.resolveEnvironment(registry, platform, options.tool));

  if (resolved.isErr()) {
    return failure(formatAppError(resolved.error));
  }

  const env = resolved.value;
  if (options.names.length > 0) {
    return successLines(options.names.map((name) => formatEnvLine(name, env.get(name) ?? '')));
  }

  const vars = options.delta ? env.delta() : env.toRecord();
  return successLines(
    Object.keys(vars)
      .sort()
      .map((name) => formatEnvLine(name, vars[name] ?? ''))
  );
}
