/**
 * Application configuration - parse, don't validate.
 *
 * Zod validates the process environment at the boundary; failures come back
 * as a `ConfigError` value.
 */

import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { Err } from '../errors/index.js';
import type { ConfigError, ConfigIssue, ValidatedAppConfig } from '../errors/index.js';
import type { LogLevel } from '../core/logging/index.js';
import { DEFAULT_TOOL_NAME } from '../domain/context.js';

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  /** Tool whose data directory holds `conf.json` when none is named */
  readonly defaultTool: string;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

const EnvSchema = z.object({
  BUILDENV_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),

  BUILDENV_TOOL: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'BUILDENV_TOOL must be a plain tool name')
    .optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type LoadConfigResult = Result<ValidatedConfig, ConfigError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/** Tests and local construction only: skips env parsing. */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.BUILDENV_LOG_LEVEL },
    defaultTool: env.BUILDENV_TOOL ?? DEFAULT_TOOL_NAME,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
