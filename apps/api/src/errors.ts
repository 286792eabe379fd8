import { ExecutionErrorCode } from './types';

export type ErrorKind =
  | 'network'
  | 'model_loading'
  | 'malformed_response'
  | 'rate_limited'
  | 'validation_rejected'
  | 'execution'
  | 'empty_schema';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

export class NetworkError extends AppError {
  readonly kind = 'network';
  readonly status = 502;

  constructor(message: string, readonly upstreamStatus?: number) {
    super(message);
  }
}

export class ModelLoadingError extends AppError {
  readonly kind = 'model_loading';
  readonly status = 503;

  constructor(message: string, readonly estimatedSeconds?: number) {
    super(message);
  }

  details() {
    return this.estimatedSeconds === undefined ? {} : { estimatedSeconds: this.estimatedSeconds };
  }
}

export class MalformedResponseError extends AppError {
  readonly kind = 'malformed_response';
  readonly status = 502;
}

export class RateLimitedError extends AppError {
  readonly kind = 'rate_limited';
  readonly status = 429;
}

export class ValidationRejectedError extends AppError {
  readonly kind = 'validation_rejected';
  readonly status = 422;

  constructor(message: string, readonly sql: string) {
    super(message);
  }

  details() {
    return { sql: this.sql };
  }
}

export class ExecutionError extends AppError {
  readonly kind = 'execution';
  readonly status = 400;

  constructor(
    message: string,
    readonly code: ExecutionErrorCode,
    readonly suggestions: string[] = [],
  ) {
    super(message);
  }

  details() {
    return { code: this.code, suggestions: this.suggestions };
  }
}

export class EmptySchemaError extends AppError {
  readonly kind = 'empty_schema';
  readonly status = 400;
}

const MESSAGES: Record<ErrorKind, (err: AppError) => string> = {
  network: () => 'The inference service could not be reached or timed out. Try again in a moment.',
  model_loading: () =>
    'The model is still starting up on the inference service. Wait a few seconds and ask again.',
  malformed_response: () =>
    'The model answered, but no usable SQL or schema could be read from its reply. Try rephrasing.',
  rate_limited: () =>
    'The inference service is rate limiting requests. Configure an API token or wait before retrying.',
  validation_rejected: () =>
    'Only SELECT or WITH queries are run against the demo database. This query was not executed.',
  execution: (err) => `The demo database rejected the query: ${err.message}`,
  empty_schema: () => 'Define a schema with at least one table before asking a question.',
};

export function describeError(err: AppError): string {
  return MESSAGES[err.kind](err);
}

// Read by shape: errors raised by native add-ons may come from another realm under test runners.
export function messageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
