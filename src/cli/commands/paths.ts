/**
 * Paths Command
 *
 * Prints every location derived from the root and the tool's data
 * directory, one `name: path` per line.
 */

import type { Result } from 'neverthrow';
import type { AppError } from '../../errors/index.js';
import { formatAppError } from '../../errors/index.js';
import type { ProjectRegistry } from '../../domain/tools-config.js';
import type { ResolvedPaths } from '../../application/services/environment-service.js';
import type { CliResult } from '../types/cli-result.js';
import { failure, successLines } from '../types/cli-result.js';

export interface PathsCommandDeps {
  readonly loadRegistry: (filePath: string) => Result<ProjectRegistry, AppError>;
  readonly resolvePaths: (
    registry: ProjectRegistry,
    toolName?: string,
    manifestName?: string
  ) => Result<ResolvedPaths, AppError>;
  readonly gitRepoHost: () => string;
}

export interface PathsCommandOptions {
  readonly registry: string;
  readonly tool?: string;
  readonly manifest?: string;
}

const LABELS: readonly (readonly [keyof ResolvedPaths, string])[] = [
  ['root', 'root'],
  ['localManifestFile', 'local-manifest'],
  ['localSnapshotDir', 'local-snapshots'],
  ['manifestDir', 'manifests'],
  ['remoteSnapshotDir', 'remote-snapshots'],
  ['manifest', 'manifest'],
  ['dataDir', 'data-dir'],
  ['configFile', 'config'],
  ['buildCopRotation', 'buildcop-rotation'],
];

export function executePathsCommand(deps: PathsCommandDeps, options: PathsCommandOptions): CliResult {
  const resolved = deps
    .loadRegistry(options.registry)
    .andThen((registry) => deps.resolvePaths(registry, options.tool, options.manifest));

  if (resolved.isErr()) {
    return failure(formatAppError(resolved.error));
  }

  const paths = resolved.value;
  return successLines([
    ...LABELS.map(([key, label]) => `${label}: ${paths[key]}`),
    `git-repo-host: ${deps.gitRepoHost()}`,
  ]);
}
