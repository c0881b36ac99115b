import * as path from 'path';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { NotFoundError } from '../errors/index.js';
import { Err } from '../errors/index.js';
import type { RootContext, ToolContext } from './context.js';
import { DEFAULT_TOOL_NAME } from './context.js';
import type { RootError } from './root.js';
import { resolveRoot } from './root.js';

/**
 * Well-known locations under the root.
 *
 * Layout:
 * - <root>/.local_manifest
 * - <root>/.snapshot/
 * - <root>/.manifest/v2/<name>
 * - <root>/.manifest/v2/snapshot/
 * - <project>/<tool-data>/conf.json, buildcop.xml
 */

export function localManifestFile(ctx: RootContext): Result<string, RootError> {
  return resolveRoot(ctx).map((root) => path.join(root, '.local_manifest'));
}

export function localSnapshotDir(ctx: RootContext): Result<string, RootError> {
  return resolveRoot(ctx).map((root) => path.join(root, '.snapshot'));
}

export function manifestDir(ctx: RootContext): Result<string, RootError> {
  return resolveRoot(ctx).map((root) => path.join(root, '.manifest', 'v2'));
}

export function manifestFile(ctx: RootContext, name: string): Result<string, RootError> {
  return manifestDir(ctx).map((dir) => path.join(dir, name));
}

export function remoteSnapshotDir(ctx: RootContext): Result<string, RootError> {
  return manifestDir(ctx).map((dir) => path.join(dir, 'snapshot'));
}

export const DEFAULT_MANIFEST_NAME = 'default';

/**
 * Absolute names are returned as given, relative ones live in the manifest
 * directory. Without a name the local manifest wins if present; otherwise
 * the `default` manifest path is returned (without checking it exists).
 */
export function resolveManifestPath(ctx: RootContext, name?: string): Result<string, RootError> {
  if (name !== undefined && name !== '') {
    return path.isAbsolute(name) ? ok(name) : manifestFile(ctx, name);
  }

  return localManifestFile(ctx).andThen((local) =>
    ctx.fs.stat(local).match(
      (): Result<string, RootError> => ok(local),
      (e): Result<string, RootError> =>
        e.code === 'FS_NOT_FOUND' ? resolveManifestPath(ctx, DEFAULT_MANIFEST_NAME) : err(Err.io('Stat', local, e))
    )
  );
}

export type DataDirError = RootError | NotFoundError;

/** `<project-path>/<tool-data>` for the named tool (default `v23`). */
export function dataDirPath(ctx: ToolContext, toolName: string = ctx.toolName): Result<string, DataDirError> {
  const name = toolName === '' ? DEFAULT_TOOL_NAME : toolName;

  const tool = ctx.registry.tools[name];
  if (tool === undefined) return err(Err.toolNotFound(name));

  const project = ctx.registry.projects[tool.project];
  if (project === undefined) return err(Err.projectNotFound(tool.project));

  // The root is required even for an absolute project path.
  return resolveRoot(ctx).map((root) =>
    path.isAbsolute(project.path) ? path.join(project.path, tool.data) : path.join(root, project.path, tool.data)
  );
}

export function configFilePath(ctx: ToolContext): Result<string, DataDirError> {
  return dataDirPath(ctx).map((dir) => path.join(dir, 'conf.json'));
}

export function buildCopRotationPath(ctx: ToolContext): Result<string, DataDirError> {
  return dataDirPath(ctx).map((dir) => path.join(dir, 'buildcop.xml'));
}

export const GIT_REPO_HOST = 'https://vanadium.googlesource.com/';

/** URL that hosts the tree's git repositories. */
export function gitRepoHost(): string {
  return GIT_REPO_HOST;
}
