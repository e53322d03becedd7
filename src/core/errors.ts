import type { ConnectorType, JobStatus, SourceType } from './types.js';

export class MissingKeyAttributeError extends Error {
  readonly code = 'MISSING_KEY_ATTRIBUTE';

  constructor(
    readonly sourceType: SourceType,
    readonly missing: string[],
  ) {
    super(`${sourceType} record is missing key attribute(s): ${missing.join(', ')}`);
    this.name = 'MissingKeyAttributeError';
  }
}

export class UnsupportedSourceTypeError extends Error {
  readonly code = 'UNSUPPORTED_SOURCE_TYPE';

  constructor(readonly sourceType: string) {
    super(`Unsupported source type: ${sourceType}`);
    this.name = 'UnsupportedSourceTypeError';
  }
}

export class ConnectorFetchError extends Error {
  readonly code = 'CONNECTOR_FETCH_ERROR';

  constructor(
    readonly connectorType: ConnectorType,
    message: string,
    readonly cause?: unknown,
  ) {
    super(`${connectorType}: ${message}`);
    this.name = 'ConnectorFetchError';
  }
}

export class JobTimeoutError extends Error {
  readonly code = 'JOB_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`job timed out after ${timeoutMs}ms`);
    this.name = 'JobTimeoutError';
  }
}

export class DuplicateJobInProgressError extends Error {
  readonly code = 'JOB_IN_PROGRESS';

  constructor(
    readonly connectorId: string,
    readonly activeJobId: string | null,
  ) {
    super(
      activeJobId
        ? `Job ${activeJobId} already in progress for connector ${connectorId}`
        : `A job is already in progress for connector ${connectorId}`,
    );
    this.name = 'DuplicateJobInProgressError';
  }
}

export class JobStateError extends Error {
  readonly code = 'JOB_STATE';

  constructor(
    readonly jobId: string,
    readonly status: JobStatus,
    action: string,
  ) {
    super(`Cannot ${action} job ${jobId} in status ${status}`);
    this.name = 'JobStateError';
  }
}

export class EnclaveScopeError extends Error {
  readonly code = 'ENCLAVE_SCOPE';

  constructor(resource: string, id: string) {
    super(`${resource} ${id} does not belong to this enclave`);
    this.name = 'EnclaveScopeError';
  }
}

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
