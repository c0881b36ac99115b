export type { CliOutput, CliResult } from './cli-result.js';
export { successLines, failure, misuse } from './cli-result.js';
export type { ExitCode } from './exit-code.js';
export { toNumericExitCode } from './exit-code.js';
