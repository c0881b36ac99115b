export { executeEnvCommand, formatEnvLine } from './env.js';
export type { EnvCommandDeps, EnvCommandOptions } from './env.js';

export { executePathsCommand } from './paths.js';
export type { PathsCommandDeps, PathsCommandOptions } from './paths.js';
