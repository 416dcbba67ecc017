import { HttpStatus } from '@nestjs/common';

export type ErrorKind =
  | 'CONFIGURATION'
  | 'DATABASE_UNAVAILABLE'
  | 'QUERY_FAILED'
  | 'LLM_UNAVAILABLE'
  | 'LLM_TIMEOUT';

/**
 * Base class for failures the HTTP layer renders as
 * `{ error: { kind, message } }`.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: HttpStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No usable connection source, or an invalid environment. Fatal at startup. */
export class ConfigurationError extends AppError {
  readonly kind = 'CONFIGURATION';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class DatabaseUnavailableError extends AppError {
  readonly kind = 'DATABASE_UNAVAILABLE';
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;
}

export class QueryFailedError extends AppError {
  readonly kind = 'QUERY_FAILED';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;
}

export class LlmUnavailableError extends AppError {
  readonly kind = 'LLM_UNAVAILABLE';
  readonly status = HttpStatus.BAD_GATEWAY;
}

export class LlmTimeoutError extends AppError {
  readonly kind = 'LLM_TIMEOUT';
  readonly status = HttpStatus.GATEWAY_TIMEOUT;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
