/**
 * The only place a CliResult becomes process output and an exit code.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end on its own.
      return;

    case 'failure':
      process.exitCode = toNumericExitCode(result.exitCode);
  }
}
