/**
 * Error taxonomy for the orchestration layer.
 *
 * Admission errors are raised synchronously before anything is enqueued.
 * Provider errors carry whether a retry may help and a message that is safe
 * to show to the end user. Invariant violations are never recovered from.
 */

export type AdmissionErrorCode = 'rate_limited' | 'invalid_request' | 'backpressure';

export abstract class AdmissionError extends Error {
  abstract readonly code: AdmissionErrorCode;
  abstract readonly httpStatus: number;
}

export class ValidationError extends AdmissionError {
  readonly code = 'invalid_request' as const;
  readonly httpStatus = 400;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RateLimitedError extends AdmissionError {
  readonly code = 'rate_limited' as const;
  readonly httpStatus = 429;

  constructor(readonly retryAfterSeconds: number) {
    super(`Too many requests. Retry after ${retryAfterSeconds}s`);
    this.name = 'RateLimitedError';
  }
}

export class BackpressureError extends AdmissionError {
  readonly code = 'backpressure' as const;
  readonly httpStatus = 503;

  constructor(
    readonly queueDepth: number,
    readonly highWaterMark: number
  ) {
    super(`Generation queue is full (${queueDepth}/${highWaterMark}). Try again later`);
    this.name = 'BackpressureError';
  }
}

export type ProviderErrorKind = 'network' | 'timeout' | 'server' | 'client' | 'circuit_open';

export class ProviderError extends Error {
  constructor(
    readonly kind: ProviderErrorKind,
    readonly userMessage: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(statusCode ? `${kind} error (HTTP ${statusCode}): ${userMessage}` : `${kind} error: ${userMessage}`, options);
    this.name = 'ProviderError';
  }

  get retryable(): boolean {
    return this.kind !== 'client';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Job was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      `Failed after ${attempts} attempts. Last error: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
    this.name = 'RetryExhaustedError';
  }
}

export class JobNotFoundError extends Error {
  readonly httpStatus = 404;

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

/**
 * Raised when the job table would be driven into an inconsistent state.
 * Callers must not catch and continue.
 */
export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Illegal job transition ${from} -> ${to} for job ${jobId}`);
    this.name = 'InvalidTransitionError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Message that may be shown to an end user for a failure. Internal errors
 * collapse into a generic sentence; their detail only goes to the logs.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof ProviderError) {
    return error.userMessage;
  }
  if (error instanceof RetryExhaustedError) {
    return `Generation failed after ${error.attempts} attempts: ${toUserMessage(error.lastError)}`;
  }
  if (error instanceof TimeoutError) {
    return 'The video provider did not answer in time';
  }
  if (error instanceof AdmissionError || error instanceof JobNotFoundError) {
    return error.message;
  }
  return 'Internal error while generating the video';
}
