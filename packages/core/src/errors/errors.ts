/**
 * Filesystem error taxonomy
 *
 * Every node, listing and filter operation fails with one of these classes so
 * callers can branch on `code` (or `instanceof`) instead of parsing messages.
 */

export type FilesystemErrorCode =
  | 'INVALID_PATH'
  | 'NOT_FOUND'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'NOT_A_LINK'
  | 'ALREADY_EXISTS'
  | 'DIRECTORY_NOT_EMPTY'
  | 'UNSUPPORTED'
  | 'IO_FAILURE'
  | 'CYCLIC_STRUCTURE'
  | 'INCOMPLETE_OPERATION'
  | 'INVALID_FILTER'
  | 'FILESYSTEM_CLOSED';

/**
 * Base class for all filesystem errors
 */
export class FilesystemError extends Error {
  public readonly code: FilesystemErrorCode;
  public readonly pathname: string | undefined;

  constructor(message: string, code: FilesystemErrorCode, pathname?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'FilesystemError';
    this.code = code;
    this.pathname = pathname;
    Object.setPrototypeOf(this, FilesystemError.prototype);
  }
}

/**
 * Malformed pathname, or one that ascends above its root
 */
export class InvalidPathError extends FilesystemError {
  public readonly reason: string;

  constructor(raw: string, reason: string) {
    super(`Invalid pathname "${raw}": ${reason}`, 'INVALID_PATH', raw);
    this.name = 'InvalidPathError';
    this.reason = reason;
    Object.setPrototypeOf(this, InvalidPathError.prototype);
  }
}

export class NotFoundError extends FilesystemError {
  constructor(pathname: string) {
    super(`Pathname ${pathname} does not exist!`, 'NOT_FOUND', pathname);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class NotAFileError extends FilesystemError {
  constructor(pathname: string) {
    super(`Pathname ${pathname} is not a file!`, 'NOT_A_FILE', pathname);
    this.name = 'NotAFileError';
    Object.setPrototypeOf(this, NotAFileError.prototype);
  }
}

export class NotADirectoryError extends FilesystemError {
  constructor(pathname: string) {
    super(`Pathname ${pathname} is not a directory!`, 'NOT_A_DIRECTORY', pathname);
    this.name = 'NotADirectoryError';
    Object.setPrototypeOf(this, NotADirectoryError.prototype);
  }
}

export class NotALinkError extends FilesystemError {
  constructor(pathname: string) {
    super(`Pathname ${pathname} is not a link!`, 'NOT_A_LINK', pathname);
    this.name = 'NotALinkError';
    Object.setPrototypeOf(this, NotALinkError.prototype);
  }
}

export class AlreadyExistsError extends FilesystemError {
  constructor(pathname: string) {
    super(`Pathname ${pathname} already exists!`, 'ALREADY_EXISTS', pathname);
    this.name = 'AlreadyExistsError';
    Object.setPrototypeOf(this, AlreadyExistsError.prototype);
  }
}

export class DirectoryNotEmptyError extends FilesystemError {
  constructor(pathname: string) {
    super(`Directory ${pathname} is not empty!`, 'DIRECTORY_NOT_EMPTY', pathname);
    this.name = 'DirectoryNotEmptyError';
    Object.setPrototypeOf(this, DirectoryNotEmptyError.prototype);
  }
}

/**
 * The adapter does not provide the capability an operation needs
 */
export class UnsupportedError extends FilesystemError {
  public readonly capability: string;
  public readonly adapterId: string;

  constructor(pathname: string, capability: string, adapterId: string) {
    super(`Adapter "${adapterId}" does not support ${capability} (pathname ${pathname})`, 'UNSUPPORTED', pathname);
    this.name = 'UnsupportedError';
    this.capability = capability;
    this.adapterId = adapterId;
    Object.setPrototypeOf(this, UnsupportedError.prototype);
  }
}

/**
 * Transport or storage failure underneath an adapter call
 */
export class IOFailureError extends FilesystemError {
  constructor(pathname: string, cause: unknown) {
    super(`I/O failure on ${pathname}: ${describeCause(cause)}`, 'IO_FAILURE', pathname, cause);
    this.name = 'IOFailureError';
    Object.setPrototypeOf(this, IOFailureError.prototype);
  }
}

/**
 * A link chain or a recursive traversal came back to where it started
 */
export class CyclicStructureError extends FilesystemError {
  public readonly target: string;

  constructor(pathname: string, target: string) {
    super(`Cyclic structure at ${pathname} (resolves to ${target})`, 'CYCLIC_STRUCTURE', pathname);
    this.name = 'CyclicStructureError';
    this.target = target;
    Object.setPrototypeOf(this, CyclicStructureError.prototype);
  }
}

export type StructuralOperation = 'copy' | 'move' | 'delete';

/**
 * A copy, move or delete failed after it had already changed something.
 * Nothing is rolled back: `completed` lists what was done before `failure`.
 */
export class IncompleteOperationError extends FilesystemError {
  public readonly operation: StructuralOperation;
  public readonly completed: readonly string[];
  public readonly failure: FilesystemError;

  constructor(operation: StructuralOperation, completed: readonly string[], failure: FilesystemError) {
    const failedAt = failure.pathname ?? 'unknown pathname';
    super(
      `${operation} was only partially completed (${completed.length} entries done), failed at ${failedAt}: ${failure.message}`,
      'INCOMPLETE_OPERATION',
      failure.pathname,
      failure,
    );
    this.name = 'IncompleteOperationError';
    this.operation = operation;
    this.completed = completed;
    this.failure = failure;
    Object.setPrototypeOf(this, IncompleteOperationError.prototype);
  }
}

export class InvalidFilterError extends FilesystemError {
  constructor(reason: string) {
    super(`Invalid listing filter: ${reason}`, 'INVALID_FILTER');
    this.name = 'InvalidFilterError';
    Object.setPrototypeOf(this, InvalidFilterError.prototype);
  }
}

export class FilesystemClosedError extends FilesystemError {
  constructor(pathname: string) {
    super(`Filesystem owning ${pathname} has been destroyed`, 'FILESYSTEM_CLOSED', pathname);
    this.name = 'FilesystemClosedError';
    Object.setPrototypeOf(this, FilesystemClosedError.prototype);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Passes taxonomy errors through and wraps anything else as an I/O failure
 */
export function toFilesystemError(error: unknown, pathname: string): FilesystemError {
  if (error instanceof FilesystemError) {
    return error;
  }
  return new IOFailureError(pathname, error);
}

export function isFilesystemError(error: unknown, code?: FilesystemErrorCode): error is FilesystemError {
  return error instanceof FilesystemError && (code === undefined || error.code === code);
}
