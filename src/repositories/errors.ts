export class RepositoryError extends Error {
  readonly code: string = 'REPOSITORY_ERROR';

  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

/** Storage could not be reached or refused the write for a reason other than a constraint. */
export class StorageUnavailableError extends RepositoryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StorageUnavailableError';
  }
}

/** A concurrent writer won a uniqueness or version race. */
export class StorageConflictError extends RepositoryError {
  override readonly code = 'STORAGE_CONFLICT';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StorageConflictError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends Error {
  readonly code = 'CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/**
 * Wrap a driver error: unique-constraint violations become StorageConflictError,
 * everything else StorageUnavailableError. Errors that already carry a domain
 * code (repository, job state, not found) pass through.
 */
export function wrapStorageError(message: string, err: unknown): Error {
  const code = errorCode(err);
  if (err instanceof Error && code !== undefined && !code.startsWith('SQLITE_')) return err;
  if (isUniqueViolation(err)) return new StorageConflictError(message, err);
  return new StorageUnavailableError(message, err);
}
