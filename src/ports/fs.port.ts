import type { Result } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_IO_ERROR'; readonly message: string };

export interface FileStat {
  readonly isDirectory: boolean;
}

/**
 * Port: the filesystem reads environment resolution needs.
 *
 * Synchronous on purpose: resolution runs once before a subprocess is
 * spawned and has no suspension points.
 */
export interface FileSystemPort {
  readFileUtf8(filePath: string): Result<string, FsError>;
  stat(filePath: string): Result<FileStat, FsError>;
  /** Canonical path with every symlink resolved. */
  realpath(filePath: string): Result<string, FsError>;
}
