/**
 * Error taxonomy shared by the gateway, the webhook router and the credential lifecycle.
 *
 * Every class carries the HTTP status the framework answers with, so handlers can
 * simply throw and let `createCloudFunction` map the failure.
 */

export { HttpError } from '../framework/errors';

export type AppErrorCode = 'VALIDATION' | 'AUTH' | 'UPSTREAM' | 'TIMEOUT' | 'DATABASE';

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;
  abstract readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  protected constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
  }
}

/** Disallowed SQL shape or malformed inbound payload. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION';
  readonly statusCode = 400;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = 'ValidationError';
  }
}

/** Bad verify token, unknown subscription, or a credential the tenant must re-authorize. */
export class AuthError extends AppError {
  readonly code = 'AUTH';
  readonly statusCode = 403;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    Object.setPrototypeOf(this, AuthError.prototype);
    this.name = 'AuthError';
  }
}

/** Non-2xx answer from the activity provider. */
export class UpstreamError extends AppError {
  readonly code = 'UPSTREAM';
  readonly statusCode = 502;
  public readonly status: number;
  public readonly body: string;
  public readonly url?: string;

  constructor(status: number, message: string, body = '', url?: string) {
    super(message, { status, url });
    this.status = status;
    this.body = body;
    this.url = url;
    Object.setPrototypeOf(this, UpstreamError.prototype);
    this.name = 'UpstreamError';
  }
}

/** Query execution or outbound request exceeded its deadline. */
export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT';
  readonly statusCode = 504;
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, { timeoutMs });
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TimeoutError.prototype);
    this.name = 'TimeoutError';
  }
}

/** Driver failure: constraint violation, bad column, lost connection. */
export class DatabaseError extends AppError {
  readonly code = 'DATABASE';
  readonly statusCode = 500;
  /** SQLSTATE reported by Postgres, when there is one. */
  public readonly sqlState?: string;

  constructor(message: string, sqlState?: string) {
    super(message, sqlState ? { sqlState } : undefined);
    this.sqlState = sqlState;
    Object.setPrototypeOf(this, DatabaseError.prototype);
    this.name = 'DatabaseError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
