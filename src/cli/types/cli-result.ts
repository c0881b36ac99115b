/**
 * Commands return a CliResult; only the composition root turns it into
 * output and an exit code.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  /** `stdout` lines are printed verbatim, for shells to consume */
  | { kind: 'success'; stdout: readonly string[] }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function successLines(stdout: readonly string[]): CliResult {
  return { kind: 'success', stdout };
}

export function failure(
  message: string,
  options?: {
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
