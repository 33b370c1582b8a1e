/**
 * Error taxonomy shared by every stage of a run.
 *
 * File-level errors are recorded per file by the router, build and storage
 * errors are recorded per artifact, and only ConfigError is fatal.
 */

export type FileErrorCode = 'IOError' | 'PermissionDenied' | 'InvalidContent';
export type BuildErrorCode = 'Undersized' | 'PackError';
export type StorageErrorCode =
  | 'AuthError'
  | 'UploadError'
  | 'DeleteError'
  | 'Timeout';
export type ErrorCode =
  | FileErrorCode
  | BuildErrorCode
  | StorageErrorCode
  | 'ConfigError';

export class DropshelfError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class FileError extends DropshelfError {
  declare readonly code: FileErrorCode;

  constructor(code: FileErrorCode, message: string, cause?: unknown) {
    super(code, message, { cause });
  }
}

export class PackError extends DropshelfError {
  constructor(message: string, cause?: unknown) {
    super('PackError', message, { cause });
  }
}

export class StorageError extends DropshelfError {
  declare readonly code: StorageErrorCode;
  readonly retryable: boolean;

  constructor(
    code: StorageErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(code, message, { cause: options.cause });
    this.retryable = options.retryable ?? code !== 'AuthError';
  }
}

export class AuthError extends StorageError {
  constructor(message: string, cause?: unknown) {
    super('AuthError', message, { retryable: false, cause });
  }
}

export class UploadError extends StorageError {
  constructor(message: string, cause?: unknown) {
    super('UploadError', message, { cause });
  }
}

export class DeleteError extends StorageError {
  constructor(message: string, cause?: unknown) {
    super('DeleteError', message, { cause });
  }
}

/**
 * A storage call that did not answer in time. Treated as a retryable upload
 * failure by the uploader.
 */
export class TimeoutError extends StorageError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('Timeout', `${operation} timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends DropshelfError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      'ConfigError',
      `Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    );
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a Node.js filesystem error onto the file-level taxonomy.
 */
export function classifyFsError(error: unknown): FileErrorCode {
  if (error instanceof FileError) {
    return error.code;
  }
  const code = (error as NodeJS.ErrnoException | undefined)?.code;
  if (code === 'EACCES' || code === 'EPERM') {
    return 'PermissionDenied';
  }
  return 'IOError';
}
