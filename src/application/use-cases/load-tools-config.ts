import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { parseJson } from '../../utils/parse-json.js';
import type { z } from 'zod';
import type { IOError, ParseError } from '../../errors/index.js';
import { Err } from '../../errors/index.js';
import type { ToolContext } from '../../domain/context.js';
import type { DataDirError } from '../../domain/paths.js';
import { configFilePath } from '../../domain/paths.js';
import { ToolsConfig, ToolsConfigSchema } from '../../domain/tools-config.js';

export type LoadToolsConfigError = DataDirError | IOError | ParseError;

export function describeZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Reads and validates `<data-dir>/conf.json` for the context's tool. */
export function loadToolsConfig(ctx: ToolContext): Result<ToolsConfig, LoadToolsConfigError> {
  return configFilePath(ctx).andThen((configPath) =>
    ctx.fs
      .readFileUtf8(configPath)
      .mapErr((e): LoadToolsConfigError => Err.io('ReadFile', configPath, e))
      .andThen((text) => parseJson(text).mapErr((details): LoadToolsConfigError => Err.parse(configPath, details)))
      .andThen((json): Result<ToolsConfig, LoadToolsConfigError> => {
        const parsed = ToolsConfigSchema.safeParse(json);
        return parsed.success
          ? ok(new ToolsConfig(parsed.data))
          : err(Err.parse(configPath, describeZodIssues(parsed.error)));
      })
  );
}
