/**
 * Presentation for CLI results. Decorated messages go through chalk;
 * `stdout` lines never do, so `eval "$(buildenv env)"` keeps working.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput): string {
  const lines: string[] = [chalk.red(`error: ${output.message}`)];

  if (output.details && output.details.length > 0) {
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`hint: ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.stdout.join('\n');

    case 'failure':
      return formatOutput(result.output);
  }
}

export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}
