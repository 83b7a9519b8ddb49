// server/src/utils/errors.ts
/** Error taxonomy: every AppError carries the HTTP status and a stable machine code. */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, opts: { status: number; code: string; details?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.status = opts.status;
    this.code = opts.code;
    this.details = opts.details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found", code = "NOT_FOUND") {
    super(message, { status: 404, code });
  }
}

/** Operation is valid in general but not for the entity's current status. */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 409, code: "INVALID_STATE", details });
  }
}

/** Uniqueness clash on a stored field (email, phone, plate, ...). */
export class IntegrityError extends AppError {
  constructor(message: string, code = "INTEGRITY_VIOLATION", details?: unknown) {
    super(message, { status: 409, code, details });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = "INVALID_BODY", details?: unknown) {
    super(message, { status: 422, code, details });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(message, { status: 403, code: "FORBIDDEN" });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
