import { ZodError } from 'zod';
import {
  DuplicateJobInProgressError,
  EnclaveScopeError,
  JobStateError,
  UnsupportedSourceTypeError,
  ValidationError,
} from '../core/errors.js';
import { ConflictError, NotFoundError, RepositoryError, StorageConflictError } from '../repositories/errors.js';

export interface ErrorBody {
  error: { code: string; message: string; activeJobId?: string };
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function validationBody(message: string): ErrorBody {
  return { error: { code: 'VALIDATION_ERROR', message } };
}

function hasStatusCode(err: unknown): err is Error & { statusCode: number } {
  return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

/** Maps domain and storage errors to an HTTP status and the `{ error: { code, message } }` body. */
export function toHttpError(err: unknown): { status: number; body: ErrorBody } | null {
  if (err instanceof NotFoundError) return { status: 404, body: { error: { code: err.code, message: err.message } } };
  if (err instanceof EnclaveScopeError) return { status: 403, body: { error: { code: err.code, message: err.message } } };
  if (err instanceof ValidationError || err instanceof UnsupportedSourceTypeError) {
    return { status: 400, body: { error: { code: err.code, message: err.message } } };
  }
  if (err instanceof ZodError) return { status: 400, body: validationBody(formatZodError(err)) };
  if (err instanceof DuplicateJobInProgressError) {
    const body: ErrorBody = { error: { code: err.code, message: err.message } };
    if (err.activeJobId) body.error.activeJobId = err.activeJobId;
    return { status: 409, body };
  }
  if (err instanceof JobStateError || err instanceof ConflictError || err instanceof StorageConflictError) {
    return { status: 409, body: { error: { code: err.code, message: err.message } } };
  }
  if (err instanceof RepositoryError) {
    return { status: 500, body: { error: { code: 'REPOSITORY_ERROR', message: err.message } } };
  }
  if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) {
    return { status: err.statusCode, body: { error: { code: 'BAD_REQUEST', message: err.message } } };
  }
  return null;
}
