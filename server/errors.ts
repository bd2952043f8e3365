/**
 * Business-rule failures raised by the services. The global error handler
 * renders them as `{ message, code }` with the attached HTTP status.
 */
export abstract class DomainError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthenticatedError extends DomainError {
  readonly status = 401;
  readonly code = "AUTH_REQUIRED";
}

export class PermissionDeniedError extends DomainError {
  readonly status = 403;
  readonly code = "PERMISSION_DENIED";
}

export class InvalidStateError extends DomainError {
  readonly status = 409;
  readonly code = "INVALID_STATE";
}

export class InvalidTargetError extends DomainError {
  readonly status = 422;
  readonly code = "INVALID_TARGET";
}

export class ConflictError extends DomainError {
  readonly status = 409;
  readonly code = "CONFLICT";
}

export class NotFoundError extends DomainError {
  readonly status = 404;
  readonly code = "NOT_FOUND";
}

export class ValidationError extends DomainError {
  readonly status = 400;
  readonly code = "INVALID_PARAMETERS";

  constructor(message: string, readonly details: string[] = []) {
    super(message);
  }
}

const UNIQUE_VIOLATION = "23505";

function hasCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

// Postgres reports unique-constraint failures with SQLSTATE 23505; newer drizzle
// releases wrap the driver error, so look at the cause as well.
export function isUniqueViolation(error: unknown): boolean {
  if (hasCode(error, UNIQUE_VIOLATION)) return true;
  return error instanceof Error && hasCode(error.cause, UNIQUE_VIOLATION);
}
