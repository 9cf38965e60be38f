// Error taxonomy for the sync pipeline

export type SyncErrorCode =
  | 'TRANSIENT_IO'
  | 'HISTORY_EXPIRED'
  | 'STATE_UNAVAILABLE'
  | 'MALFORMED_INPUT'
  | 'AUTH_REJECTED';

export class SyncError extends Error {
  public readonly code: SyncErrorCode;
  public readonly retryable: boolean;

  constructor(code: SyncErrorCode, message: string, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Network or rate-limit failure on a mailbox/storage call that outlived its retries.
 */
export class TransientIOError extends SyncError {
  public readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_IO', `${operation}: ${message}`, true, options);
    this.name = 'TransientIOError';
    this.operation = operation;
  }
}

/**
 * The mailbox no longer keeps history back to the requested cursor.
 * Callers fall back to a full sync instead of retrying incrementally.
 */
export class HistoryExpiredError extends SyncError {
  public readonly cursor: string;

  constructor(cursor: string, options?: { cause?: unknown }) {
    super('HISTORY_EXPIRED', `History cursor ${cursor} is no longer available`, false, options);
    this.name = 'HistoryExpiredError';
    this.cursor = cursor;
  }
}

export class StateUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_UNAVAILABLE', message, true, options);
    this.name = 'StateUnavailableError';
  }
}

export class MalformedInputError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', message, false, options);
    this.name = 'MalformedInputError';
  }
}

export class AuthRejectedError extends SyncError {
  constructor(message = 'Unauthorized', options?: { cause?: unknown }) {
    super('AUTH_REJECTED', message, false, options);
    this.name = 'AuthRejectedError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
