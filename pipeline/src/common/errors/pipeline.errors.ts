import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  GatewayTimeoutException,
  HttpException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Pipeline error taxonomy.
 *
 * Every error a collaborator can see is an HttpException so the web layer
 * can serialize it as-is. Errors that a job may recover from on a later
 * attempt carry `retryable = true`; see `isRetryable`.
 */

export class NotFoundError extends NotFoundException {
  readonly retryable = false;

  constructor(resource: string, id: string) {
    super(`${resource} ${id} not found`);
  }
}

export class InvalidTransitionError extends ConflictException {
  readonly retryable = false;

  constructor(
    readonly documentId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Document ${documentId} cannot move from ${from} to ${to}`);
  }
}

export class EmbeddingUnavailableError extends ServiceUnavailableException {
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class LanguageModelError extends BadGatewayException {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly upstreamStatus?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class RateLimitExceededError extends HttpException {
  readonly retryable = true;

  constructor(timeoutMs: number) {
    super(
      `No language-model call slot became available within ${timeoutMs}ms`,
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

export class AnswerTimeoutError extends GatewayTimeoutException {
  constructor(deadlineMs: number) {
    super(`Answer was not ready within ${deadlineMs}ms; it may still be cached later`);
  }
}

export class AnswerFailedError extends ServiceUnavailableException {
  constructor(cause?: unknown) {
    super('The question could not be answered right now, please try again later', { cause });
  }
}

export class DocumentExtractionError extends UnprocessableEntityException {
  readonly retryable = false;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class VectorDimensionError extends BadRequestException {
  readonly retryable = false;

  constructor(expected: number, actual: number) {
    super(`Vector must have ${expected} dimensions, got ${actual}`);
  }
}

export class JobCancelledError extends Error {
  readonly retryable = false;

  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = 'JobCancelledError';
  }
}

/**
 * Decides whether a failed job attempt should be re-queued. An explicit
 * `retryable` flag wins; other HttpExceptions are caller mistakes and are
 * terminal; anything else (network, driver) is treated as transient.
 */
export function isRetryable(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'retryable' in error) {
    return error.retryable === true;
  }
  if (error instanceof HttpException) {
    return false;
  }
  return true;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
