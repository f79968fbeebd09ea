/**
 * Mediator error utilities.
 *
 * Every failure that leaves the fetch orchestrator is a MediatorError with a
 * discriminating `code`, so callers can tell "try again later" apart from
 * "this query is invalid" without inspecting messages.
 */

import type { ZodError } from 'zod';
import { RetryAbortedError } from '../utils/retry.js';
import type { RateWindowKind } from '../types/rate-limit.js';

/**
 * Error codes surfaced to the tool layer.
 */
export type MediatorErrorCode =
  | 'QuotaExhausted'
  | 'QuotaRejected'
  | 'TransportFailure'
  | 'UpstreamError'
  | 'InternalInvariantViolation'
  | 'ValidationError'
  | 'Cancelled';

/**
 * Plain error shape (for tool responses and logs).
 */
export interface MediatorErrorShape {
  code: MediatorErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class MediatorError extends Error implements MediatorErrorShape {
  public readonly code: MediatorErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: MediatorErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MediatorError';
    this.code = code;
    this.details = details;
  }

  public toObject(): MediatorErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * No admission is possible within the allowed wait, or the upstream
 * confirmed a quota rejection. Not retried by the core.
 */
export class QuotaExhaustedError extends MediatorError {
  public readonly retryInMs?: number;

  constructor(message: string, details: { retryInMs?: number } & Record<string, unknown> = {}) {
    super('QuotaExhausted', message, details);
    this.name = 'QuotaExhaustedError';
    this.retryInMs = details.retryInMs;
  }
}

/**
 * Raised by the transport when the upstream answers with a quota rejection
 * (HTTP 429 or a quota error in the body). The orchestrator reports it to
 * the rate limiter and converts it into QuotaExhaustedError.
 */
export class QuotaRejectedError extends MediatorError {
  public readonly retryAfterMs?: number;
  public readonly window?: RateWindowKind;

  constructor(
    message: string,
    details: { retryAfterMs?: number; window?: RateWindowKind; status?: number } = {}
  ) {
    super('QuotaRejected', message, details);
    this.name = 'QuotaRejectedError';
    this.retryAfterMs = details.retryAfterMs;
    this.window = details.window;
  }
}

/**
 * Transient network or parse failure. Retried locally a bounded number of
 * times before it is surfaced.
 */
export class TransportFailureError extends MediatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TransportFailure', message, details);
    this.name = 'TransportFailureError';
  }
}

/**
 * Well-formed rejection from the remote service unrelated to quota.
 * Never retried.
 */
export class UpstreamError extends MediatorError {
  public readonly status?: number;

  constructor(message: string, details: { status?: number } & Record<string, unknown> = {}) {
    super('UpstreamError', message, details);
    this.name = 'UpstreamError';
    this.status = details.status;
  }
}

/**
 * A defect inside the core, e.g. two distinct queries sharing a fingerprint.
 */
export class InvariantViolationError extends MediatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('InternalInvariantViolation', message, details);
    this.name = 'InvariantViolationError';
  }
}

export class FetchCancelledError extends MediatorError {
  constructor(message = 'Fetch cancelled by caller', details?: Record<string, unknown>) {
    super('Cancelled', message, details);
    this.name = 'FetchCancelledError';
  }
}

export class ValidationError extends MediatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ValidationError', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Map unknown errors into MediatorError instances.
 *
 * Anything that is not already a MediatorError is treated as a transport
 * failure, except aborts which become `Cancelled`.
 */
export function toMediatorError(error: unknown): MediatorError {
  if (error instanceof MediatorError) {
    return error;
  }

  if (error instanceof RetryAbortedError) {
    return new FetchCancelledError(error.message);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new FetchCancelledError(error.message || 'Operation aborted by caller');
    }
    return new TransportFailureError(error.message, { cause: error.name });
  }

  return new TransportFailureError('Unknown transport error');
}

/**
 * True when the failure is transient and the same query may succeed later.
 */
export function isRetryLater(error: MediatorError): boolean {
  return error.code === 'QuotaExhausted' || error.code === 'TransportFailure';
}

/**
 * Convert a zod validation error into a ValidationError naming the first
 * offending field.
 */
export function zodErrorToValidationError(error: ZodError): ValidationError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = firstIssue
    ? `Validation error on field '${field}': ${firstIssue.message}`
    : 'Validation error';

  return new ValidationError(message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
