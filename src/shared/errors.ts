import type { ZodError } from 'zod';

export type FieldErrors = Record<string, string[]>;

/**
 * Base class for failures that are reported to the client as-is.
 * Anything that is not an ApiError is rendered as a generic 500.
 */
export abstract class ApiError extends Error {
  abstract readonly status: number;

  body(): Record<string, unknown> {
    return { detail: this.message };
  }
}

export class ValidationError extends ApiError {
  readonly status = 400;

  constructor(readonly fields: FieldErrors) {
    super('Validation failed');
    this.name = 'ValidationError';
  }

  static field(name: string, message: string): ValidationError {
    return new ValidationError({ [name]: [message] });
  }

  static fromZod(error: ZodError): ValidationError {
    const fields: FieldErrors = {};
    for (const issue of error.issues) {
      const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
      (fields[key] ??= []).push(issue.message);
    }
    return new ValidationError(fields);
  }

  body(): Record<string, unknown> {
    return this.fields;
  }
}

/**
 * A request whose body is well-formed but rejected as a whole,
 * answered with a single detail message.
 */
export class BadRequestError extends ApiError {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export class AuthenticationError extends ApiError {
  readonly status = 401;

  constructor(message = 'Authentication credentials were not provided.') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends ApiError {
  readonly status = 403;

  constructor(message = 'You do not have permission to perform this action.') {
    super(message);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends ApiError {
  readonly status = 404;

  constructor(resource: string) {
    super(`${resource} not found.`);
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends ApiError {
  readonly status = 503;

  constructor(message = 'Service temporarily unavailable, please retry.', cause?: unknown) {
    super(message, { cause });
    this.name = 'ServiceUnavailableError';
  }
}
