import 'reflect-metadata';

// Environment resolution
export { buildEnvironment } from './application/use-cases/build-environment.js';
export type { BuildEnvironmentDeps } from './application/use-cases/build-environment.js';
export { loadToolsConfig } from './application/use-cases/load-tools-config.js';
export type { LoadToolsConfigError } from './application/use-cases/load-tools-config.js';
export { loadRegistryFile } from './application/use-cases/load-registry.js';
export { EnvironmentService } from './application/services/environment-service.js';
export type { ResolvedPaths } from './application/services/environment-service.js';

// Domain
export { EnvSnapshot, splitTokens, joinTokens } from './env/snapshot.js';
export type { EnvRecord } from './env/snapshot.js';
export { formatPlatform, hostPlatform, isHost } from './domain/platform.js';
export type { Platform, HostPlatform, ProcessIdentity } from './domain/platform.js';
export { parsePlatform } from './domain/parse-platform.js';
export { classifyPlatform, goArm } from './domain/platform-target.js';
export type { PlatformTarget } from './domain/platform-target.js';
export { resolveRoot, ROOT_ENV } from './domain/root.js';
export type { RootPath, RootError } from './domain/root.js';
export {
  localManifestFile,
  localSnapshotDir,
  manifestDir,
  manifestFile,
  remoteSnapshotDir,
  resolveManifestPath,
  dataDirPath,
  configFilePath,
  buildCopRotationPath,
  gitRepoHost,
  DEFAULT_MANIFEST_NAME,
} from './domain/paths.js';
export type { DataDirError } from './domain/paths.js';
export { ToolsConfig, ToolsConfigSchema, ProjectRegistrySchema } from './domain/tools-config.js';
export type { ProjectRegistry, ToolsConfigData } from './domain/tools-config.js';
export type { RootContext, ToolContext } from './domain/context.js';
export { DEFAULT_TOOL_NAME } from './domain/context.js';

// Ports & adapters
export type { FileSystemPort, FileStat, FsError } from './ports/fs.port.js';
export { NodeFileSystem } from './infra/local/fs/index.js';

// Errors
export { Err, formatAppError, errorFields } from './errors/index.js';
export type {
  AppError,
  ConfigError,
  IOError,
  ParseError,
  NotFoundError,
  UnsupportedPlatformError,
} from './errors/index.js';

// Config
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
