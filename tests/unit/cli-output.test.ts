import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { formatResult } from '../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../src/cli/interpret-result.js';
import { failure, misuse, successLines } from '../../src/cli/types/index.js';

describe('CLI output', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('prints success lines verbatim', () => {
    expect(formatResult(successLines(['GOOS="linux"', 'GOARCH="arm"']))).toBe('GOOS="linux"\nGOARCH="arm"');
  });

  it('prints failures with details and hints', () => {
    const result = failure('Invalid configuration', { details: ['BUILDENV_TOOL: bad'], suggestions: ['unset it'] });

    expect(formatResult(result)).toBe('error: Invalid configuration\n  BUILDENV_TOOL: bad\n\nhint: unset it');
  });

  it('writes success to stdout and leaves the exit code alone', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    interpretCliResult(successLines(['A="1"']));

    expect(log).toHaveBeenCalledWith('A="1"');
    expect(process.exitCode).toBeUndefined();
  });

  it('writes misuse to stderr with exit code 2', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    interpretCliResult(misuse('Failed to parse platform "x": expected <arch>-<os>'));

    expect(error).toHaveBeenCalledWith('error: Failed to parse platform "x": expected <arch>-<os>');
    expect(process.exitCode).toBe(2);
  });

  it('uses exit code 1 for resolution failures', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    interpretCliResult(failure('V23_ROOT is not set'));

    expect(process.exitCode).toBe(1);
  });
});
