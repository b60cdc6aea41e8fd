import { ListingStatus } from './types';

export class TreesiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type PreconditionReason = 'parent-missing' | 'parent-not-directory';

/**
 * Raised before any file-system mutation when a directory is requested
 * under a parent that is missing or is not a directory.
 */
export class DirectoryPreconditionError extends TreesiftError {
  constructor(
    readonly parent: string,
    readonly reason: PreconditionReason,
  ) {
    super(reason === 'parent-missing'
      ? `Parent directory does not exist: ${parent}`
      : `Parent is not a directory: ${parent}`);
  }
}

/** Only thrown by a walk running with `strict: true`. */
export class TraversalError extends TreesiftError {
  constructor(
    readonly directory: string,
    readonly status: Exclude<ListingStatus, 'ok' | 'empty'>,
    cause?: unknown,
  ) {
    super(`Cannot list ${directory}: ${status}`, { cause });
  }
}

export class InvalidPatternError extends TreesiftError {
  constructor(readonly pattern: string, cause: unknown) {
    super(`Invalid regular expression: ${pattern}`, { cause });
  }
}

export class QuietOperationError extends TreesiftError {}

/** Message of anything thrown, including errors raised by Node internals. */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Runs `operation` and rethrows any failure as a QuietOperationError that
 * carries the original error as its cause.
 */
export function quietly<T>(operation: () => T, description = 'File operation'): T {
  try {
    return operation();
  } catch (error) {
    throw new QuietOperationError(`${description} failed: ${describeError(error)}`, { cause: error });
  }
}
