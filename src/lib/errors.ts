export type LookupErrorKind = 'NotFound' | 'Unauthorized' | 'Transient';
export type TranscodeErrorKind = 'ProcessFailed' | 'Truncated';
export type StorageErrorKind = 'DiskFull' | 'PermissionDenied' | 'CorruptLedger';

/** Login failed or the stored credentials were rejected by the catalog. */
export class AuthError extends Error {
  readonly name = 'AuthError';
}

/** A catalog lookup (url, playlist, liked songs, search) could not be satisfied. */
export class ResolutionError extends Error {
  readonly name = 'ResolutionError';
  constructor(
    readonly kind: LookupErrorKind,
    message: string,
  ) {
    super(message);
  }
}

/** The audio stream for one item could not be obtained. */
export class FetchError extends Error {
  readonly name = 'FetchError';
  constructor(
    readonly kind: LookupErrorKind,
    message: string,
  ) {
    super(message);
  }
}

export class TranscodeError extends Error {
  readonly name = 'TranscodeError';
  constructor(
    readonly kind: TranscodeErrorKind,
    message: string,
  ) {
    super(message);
  }
}

export class StorageError extends Error {
  readonly name = 'StorageError';
  constructor(
    readonly kind: StorageErrorKind,
    message: string,
  ) {
    super(message);
  }
}

/** The stream helper could not be started at all (missing binary, bad permissions). */
export class HelperStartError extends Error {
  readonly name = 'HelperStartError';
}

export class CancelledError extends Error {
  readonly name = 'CancelledError';
  constructor(message = 'operation canceled') {
    super(message);
  }
}

/**
 * Whether retrying the same operation has a reasonable chance of succeeding.
 * Network blips and transcoder crashes qualify; missing tracks, rejected
 * credentials and a full disk do not.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof FetchError || err instanceof ResolutionError) return err.kind === 'Transient';
  if (err instanceof TranscodeError) return true;
  return false;
}

export function httpErrorKind(status: number): LookupErrorKind {
  if (status === 404) return 'NotFound';
  if (status === 401 || status === 403) return 'Unauthorized';
  return 'Transient';
}

/** The errno `code` of a Node system error, checked structurally so it holds across realms. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

// fs errors raised in another realm fail `instanceof Error` but keep their shape
function messageOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string')
    return err.message;
  return String(err);
}

/**
 * Map a filesystem error onto the storage taxonomy. Errors that are not a
 * recognised storage condition are returned untouched.
 */
export function storageErrorFrom(err: unknown): unknown {
  const code = errnoCode(err);
  const detail = messageOf(err);
  if (code === 'ENOSPC' || code === 'EDQUOT') return new StorageError('DiskFull', detail);
  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS')
    return new StorageError('PermissionDenied', detail);
  return err;
}

/** Errors that already carry a classification and must not be rewrapped. */
export function isClassified(err: unknown): err is Error {
  return (
    err instanceof AuthError ||
    err instanceof ResolutionError ||
    err instanceof FetchError ||
    err instanceof TranscodeError ||
    err instanceof StorageError ||
    err instanceof HelperStartError ||
    err instanceof CancelledError
  );
}

/** One-line description used in summaries and failure logs. */
export function describeError(err: unknown): string {
  if (err instanceof ResolutionError || err instanceof FetchError)
    return `${err.name}.${err.kind}: ${err.message}`;
  if (err instanceof TranscodeError || err instanceof StorageError)
    return `${err.name}.${err.kind}: ${err.message}`;
  return messageOf(err);
}
