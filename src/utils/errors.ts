import { QueryErrorInfo } from '../types';

/**
 * Malformed query text, unknown bill reference or bad request parameters.
 * Raised before any external call is made.
 */
export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export type ExternalErrorKind = 'transient' | 'permanent';

export type ExternalErrorReason =
  | 'timeout'
  | 'rateLimit'
  | 'serverError'
  | 'network'
  | 'badRequest'
  | 'authentication'
  | 'contentPolicy'
  | 'quotaExceeded'
  | 'emptyResponse'
  | 'unknown';

export interface ExternalServiceErrorOptions {
  status?: number;
  attempts?: number;
  exhausted?: boolean;
}

/**
 * Classified failure of the reasoning service
 */
export class ExternalServiceError extends Error {
  readonly kind: ExternalErrorKind;
  readonly reason: ExternalErrorReason;
  readonly status?: number;
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(
    kind: ExternalErrorKind,
    reason: ExternalErrorReason,
    message: string,
    options: ExternalServiceErrorOptions = {}
  ) {
    super(message);
    this.name = 'ExternalServiceError';
    this.kind = kind;
    this.reason = reason;
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
    this.exhausted = options.exhausted ?? false;
  }

  get isTransient(): boolean {
    return this.kind === 'transient';
  }

  withAttempts(attempts: number, exhausted = false): ExternalServiceError {
    return new ExternalServiceError(this.kind, this.reason, this.message, {
      status: this.status,
      attempts,
      exhausted,
    });
  }
}

/**
 * Persistence layer unavailable. Not retried.
 */
export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}

/**
 * The caller stopped waiting for an in-flight query
 */
export class WaitAbandonedError extends Error {
  readonly fingerprint: string;

  constructor(fingerprint: string) {
    super(`Wait abandoned for fingerprint ${fingerprint}`);
    this.name = 'WaitAbandonedError';
    this.fingerprint = fingerprint;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Classifies an unrecognized error by its message
 */
export function toExternalServiceError(error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }

  const message = getErrorMessage(error);
  const lower = message.toLowerCase();

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return new ExternalServiceError('transient', 'timeout', message);
  }
  if (lower.includes('rate limit') || /\b429\b/.test(lower)) {
    return new ExternalServiceError('transient', 'rateLimit', message);
  }
  if (lower.includes('econnreset') || lower.includes('econnrefused')) {
    return new ExternalServiceError('transient', 'network', message);
  }
  if (/\b5\d\d\b/.test(lower)) {
    return new ExternalServiceError('transient', 'serverError', message);
  }

  return new ExternalServiceError('permanent', 'unknown', message);
}

export function toQueryErrorInfo(error: ExternalServiceError): QueryErrorInfo {
  if (error.exhausted) {
    return {
      kind: 'retryExhausted',
      reason: error.reason,
      message: `Reasoning service failed after ${error.attempts} attempts: ${error.message}`,
      attempts: error.attempts,
    };
  }

  return {
    kind: 'permanent',
    reason: error.reason,
    message: error.message,
    attempts: error.attempts,
  };
}
