import * as fs from 'fs';
import { Result } from 'neverthrow';
import type { FileSystemPort, FileStat, FsError } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node fs errors expose a string `code`; its type is not exported.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT' || code === 'ENOTDIR') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  readFileUtf8(filePath: string): Result<string, FsError> {
    return Result.fromThrowable(
      () => fs.readFileSync(filePath, 'utf8'),
      (e) => mapFsError(e, filePath)
    )();
  }

  stat(filePath: string): Result<FileStat, FsError> {
    return Result.fromThrowable(
      () => fs.statSync(filePath),
      (e) => mapFsError(e, filePath)
    )().map((s) => ({ isDirectory: s.isDirectory() }));
  }

  realpath(filePath: string): Result<string, FsError> {
    return Result.fromThrowable(
      () => fs.realpathSync(filePath),
      (e) => mapFsError(e, filePath)
    )();
  }
}
