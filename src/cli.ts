#!/usr/bin/env node
/**
 * buildenv CLI - Composition Root
 *
 * Wires the container into each command and interprets the CliResult.
 * No resolution logic lives here.
 */

import 'reflect-metadata';
import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { FileSystemPort } from './ports/fs.port.js';
import { EnvironmentService } from './application/services/environment-service.js';
import { loadRegistryFile } from './application/use-cases/load-registry.js';
import { gitRepoHost } from './domain/paths.js';
import { createBootstrapLogger } from './core/logging/index.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import type { CliResult } from './cli/types/cli-result.js';
import { executeEnvCommand, executePathsCommand } from './cli/commands/index.js';

const logger = createBootstrapLogger('cli');

function withContainer(run: (service: EnvironmentService, fs: FileSystemPort) => CliResult): CliResult {
  const init = initializeContainer();
  if (init.isErr()) {
    logger.error({ issues: init.error.issues }, 'Configuration rejected');
    return failure(init.error.message, {
      details: init.error.issues.map((issue) => `${issue.path}: ${issue.message}`),
    });
  }
  return run(container.resolve(EnvironmentService), container.resolve<FileSystemPort>(DI.Infra.FileSystem));
}

const program = new Command();

program
  .name('buildenv')
  .description('Resolve build and cross-compilation environments for a V23_ROOT source tree')
  .version('0.1.0');

program
  .command('env')
  .description('Print the build environment as NAME="value" lines')
  .argument('[names...]', 'only print these variables')
  .requiredOption('-r, --registry <file>', 'project/tool registry JSON')
  .option('-p, --platform <platform>', 'target platform, e.g. armv7-android (default: host)')
  .option('-t, --tool <name>', 'tool whose conf.json to use')
  .option('-d, --delta', 'only print variables that differ from the current environment')
  .action((names: string[], options: { registry: string; platform?: string; tool?: string; delta?: boolean }) => {
    const result = withContainer((service, fs) =>
      executeEnvCommand(
        {
          hostPlatform: service.hostPlatform(),
          loadRegistry: (filePath) => loadRegistryFile(fs, filePath),
          resolveEnvironment: (registry, platform, toolName) => service.environment(registry, platform, toolName),
        },
        { names, ...options }
      )
    );
    interpretCliResult(result);
  });

program
  .command('paths')
  .description('Print manifest, snapshot and data directory locations')
  .requiredOption('-r, --registry <file>', 'project/tool registry JSON')
  .option('-t, --tool <name>', 'tool whose data directory to use')
  .option('-m, --manifest <name>', 'manifest name or absolute path to resolve')
  .action((options: { registry: string; tool?: string; manifest?: string }) => {
    const result = withContainer((service, fs) =>
      executePathsCommand(
        {
          loadRegistry: (filePath) => loadRegistryFile(fs, filePath),
          resolvePaths: (registry, toolName, manifestName) => service.paths(registry, toolName, manifestName),
          gitRepoHost,
        },
        options
      )
    );
    interpretCliResult(result);
  });

program.parse();
