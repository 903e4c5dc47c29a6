// src/errors.ts

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_AVAILABLE"
  | "SLOT_CONFLICT"
  | "INVALID_TRANSITION"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "AUTHENTICATION_FAILED"
  | "INVALID_TOKEN";

/**
 * Base for every recoverable domain error. Anything that is not an AppError
 * is treated as an infrastructure failure by the controllers.
 */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 400;
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

// No active availability window covers the requested interval.
export class AvailabilityError extends AppError {
  readonly code = "NOT_AVAILABLE";
  readonly status = 422;
}

export class ConflictError extends AppError {
  readonly code = "SLOT_CONFLICT";
  readonly status = 409;
}

export class InvalidTransitionError extends AppError {
  readonly code = "INVALID_TRANSITION";
  readonly status = 409;
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
}

export class PermissionError extends AppError {
  readonly code = "FORBIDDEN";
  readonly status = 403;
}

export const INVALID_CREDENTIALS_MESSAGE = "Invalid credentials";

/** Same message whether the identifier or the secret was wrong. */
export class AuthenticationError extends AppError {
  readonly code = "AUTHENTICATION_FAILED";
  readonly status = 401;

  constructor() {
    super(INVALID_CREDENTIALS_MESSAGE);
  }
}

export class InvalidTokenError extends AppError {
  readonly code = "INVALID_TOKEN";
  readonly status = 401;

  constructor(message = "Token is invalid or expired") {
    super(message);
  }
}
