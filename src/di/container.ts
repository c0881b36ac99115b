import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from './tokens.js';
import type { ConfigError } from '../errors/index.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { EnvRecord } from '../env/snapshot.js';
import type { HostPlatform } from '../domain/platform.js';
import { hostPlatform } from '../domain/platform.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';

let initialized = false;

/**
 * Composition root. Registers process-backed defaults for every token that
 * is not registered yet, so tests can pre-register fakes.
 */
export function initializeContainer(): Result<void, ConfigError> {
  if (initialized) return ok(undefined);

  if (!container.isRegistered(DI.Runtime.Env)) {
    // Env access is allowed here and nowhere below.
    container.register<EnvRecord>(DI.Runtime.Env, { useValue: { ...process.env } });
  }

  if (!container.isRegistered(DI.Runtime.HostPlatform)) {
    container.register<HostPlatform>(DI.Runtime.HostPlatform, {
      useValue: hostPlatform({ platform: process.platform, arch: process.arch }),
    });
  }

  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({ env: container.resolve<EnvRecord>(DI.Runtime.Env) });
    if (configResult.isErr()) return err(configResult.error);
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<FileSystemPort>(DI.Infra.FileSystem, { useValue: new NodeFileSystem() });
  }

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  initialized = true;
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/** Clears every registration. Test teardown only. */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
