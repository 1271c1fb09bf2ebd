/**
 * Application Errors
 *
 * Every error a use case raises on purpose carries a machine-readable code.
 * The presentation layer maps codes to responses; anything else is a 500.
 *
 * @module
 */

import type { ZodError } from 'zod';

/**
 * Common use case error codes
 */
export const UseCaseErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  CONFLICT: 'CONFLICT',
} as const;

export type UseCaseErrorCode = (typeof UseCaseErrorCodes)[keyof typeof UseCaseErrorCodes];

/**
 * Use case error
 */
export class UseCaseError extends Error {
  constructor(
    message: string,
    public readonly code: UseCaseErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'UseCaseError';
  }
}

/**
 * Invalid input. `fields` maps a form field to its messages; errors not
 * tied to one field go under `__all__`.
 */
export class ValidationError extends UseCaseError {
  constructor(public readonly fields: Record<string, string[]>) {
    super(
      `Validation failed: ${Object.keys(fields).join(', ')}`,
      UseCaseErrorCodes.VALIDATION_ERROR,
      { fields }
    );
    this.name = 'ValidationError';
  }

  static field(name: string, message: string): ValidationError {
    return new ValidationError({ [name]: [message] });
  }
}

export class NotFoundError extends UseCaseError {
  constructor(
    public readonly resource: string,
    public readonly identifier: string | number
  ) {
    super(`${resource} not found: ${identifier}`, UseCaseErrorCodes.NOT_FOUND, { resource, identifier });
    this.name = 'NotFoundError';
  }
}

/**
 * The caller may not do this. `redirect` names the page to send them to;
 * without one they go to the login page.
 */
export class AuthorizationError extends UseCaseError {
  constructor(
    message = 'Not allowed',
    public readonly redirect: string | null = null
  ) {
    super(message, UseCaseErrorCodes.UNAUTHORIZED, redirect === null ? undefined : { redirect });
    this.name = 'AuthorizationError';
  }
}

export class ConflictError extends UseCaseError {
  constructor(message: string) {
    super(message, UseCaseErrorCodes.CONFLICT);
    this.name = 'ConflictError';
  }
}

/**
 * Build a ValidationError keyed by field path from a Zod error
 */
export function validationErrorFrom(error: ZodError): ValidationError {
  const fields: Record<string, string[]> = {};
  for (const e of error.errors) {
    const path = e.path.join('.') || '__all__';
    if (!fields[path]) fields[path] = [];
    fields[path].push(e.message);
  }
  return new ValidationError(fields);
}
