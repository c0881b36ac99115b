import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { parseJson } from '../../utils/parse-json.js';
import type { IOError, ParseError } from '../../errors/index.js';
import { Err } from '../../errors/index.js';
import type { FileSystemPort } from '../../ports/fs.port.js';
import type { ProjectRegistry } from '../../domain/tools-config.js';
import { ProjectRegistrySchema } from '../../domain/tools-config.js';
import { describeZodIssues } from './load-tools-config.js';

/**
 * Reads a `{ projects, tools }` registry document. The outer tool normally
 * derives this from the manifest; the CLI takes it as a file.
 */
export function loadRegistryFile(
  fs: FileSystemPort,
  filePath: string
): Result<ProjectRegistry, IOError | ParseError> {
  return fs
    .readFileUtf8(filePath)
    .mapErr((e): IOError | ParseError => Err.io('ReadFile', filePath, e))
    .andThen((text) => parseJson(text).mapErr((details): IOError | ParseError => Err.parse(filePath, details)))
    .andThen((json): Result<ProjectRegistry, IOError | ParseError> => {
      const parsed = ProjectRegistrySchema.safeParse(json);
      return parsed.success ? ok(parsed.data) : err(Err.parse(filePath, describeZodIssues(parsed.error)));
    });
}
