import { inject, singleton } from 'tsyringe';
import { Result } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { AppError } from '../../errors/index.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { EnvRecord, EnvSnapshot } from '../../env/snapshot.js';
import type { FileSystemPort } from '../../ports/fs.port.js';
import type { ToolContext } from '../../domain/context.js';
import type { HostPlatform, Platform } from '../../domain/platform.js';
import type { ProjectRegistry } from '../../domain/tools-config.js';
import {
  buildCopRotationPath,
  configFilePath,
  dataDirPath,
  localManifestFile,
  localSnapshotDir,
  manifestDir,
  remoteSnapshotDir,
  resolveManifestPath,
} from '../../domain/paths.js';
import { resolveRoot } from '../../domain/root.js';
import { buildEnvironment } from '../use-cases/build-environment.js';

export interface ResolvedPaths {
  readonly root: string;
  readonly localManifestFile: string;
  readonly localSnapshotDir: string;
  readonly manifestDir: string;
  readonly remoteSnapshotDir: string;
  readonly manifest: string;
  readonly dataDir: string;
  readonly configFile: string;
  readonly buildCopRotation: string;
}

/**
 * Environment resolution bound to the container's environment, filesystem
 * and host. Each call starts from the injected environment record.
 */
@singleton()
export class EnvironmentService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Runtime.Env) private readonly env: EnvRecord,
    @inject(DI.Runtime.HostPlatform) private readonly host: HostPlatform,
    @inject(DI.Infra.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('EnvironmentService');
  }

  hostPlatform(): HostPlatform {
    return this.host;
  }

  context(registry: ProjectRegistry, toolName?: string): ToolContext {
    return {
      env: this.env,
      fs: this.fs,
      registry,
      toolName: toolName ?? this.config.defaultTool,
    };
  }

  /** Environment for `platform`; defaults to the host. */
  environment(registry: ProjectRegistry, platform: Platform = this.host, toolName?: string): Result<EnvSnapshot, AppError> {
    return buildEnvironment(this.context(registry, toolName), platform, {
      host: this.host,
      logger: this.logger,
    });
  }

  paths(registry: ProjectRegistry, toolName?: string, manifestName?: string): Result<ResolvedPaths, AppError> {
    const ctx = this.context(registry, toolName);
    return Result.combine([
      resolveRoot(ctx),
      localManifestFile(ctx),
      localSnapshotDir(ctx),
      manifestDir(ctx),
      remoteSnapshotDir(ctx),
      resolveManifestPath(ctx, manifestName),
      dataDirPath(ctx),
      configFilePath(ctx),
      buildCopRotationPath(ctx),
    ]).map(([root, local, snapshot, manifests, remote, manifest, dataDir, configFile, buildCop]) => ({
      root,
      localManifestFile: local,
      localSnapshotDir: snapshot,
      manifestDir: manifests,
      remoteSnapshotDir: remote,
      manifest,
      dataDir,
      configFile,
      buildCopRotation: buildCop,
    }));
  }
}
