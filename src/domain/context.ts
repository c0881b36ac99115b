import type { EnvRecord } from '../env/snapshot.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ProjectRegistry } from './tools-config.js';

/** Inputs for anything derived from the root. */
export interface RootContext {
  /** Environment the root variable is read from; never mutated. */
  readonly env: EnvRecord;
  readonly fs: FileSystemPort;
}

/** Inputs for anything derived from a tool's data directory. */
export interface ToolContext extends RootContext {
  readonly registry: ProjectRegistry;
  /** Empty means the default tool, `v23`. */
  readonly toolName: string;
}

export const DEFAULT_TOOL_NAME = 'v23';
