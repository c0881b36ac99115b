/**
 * Typed exit codes, Unix conventions.
 */
export type ExitCode =
  | { kind: 'general_error' }  // 1 - resolution failed
  | { kind: 'misuse' };        // 2 - bad arguments

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
