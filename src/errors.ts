export type ErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "ALREADY_SETTLED"
  | "DATABASE_UNAVAILABLE";

/**
 * Failure surfaced to the caller as a failed request.
 * `status` is the HTTP status the API answers with.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super("INVALID_INPUT", 400, message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: number | string) {
    super("NOT_FOUND", 404, `${entity} ${id} not found`);
  }
}

export class AlreadySettledError extends AppError {
  constructor(id: number) {
    super("ALREADY_SETTLED", 409, `Shared expense ${id} is already settled`);
  }
}

export class DatabaseUnavailableError extends AppError {
  constructor(cause: unknown) {
    super("DATABASE_UNAVAILABLE", 503, "Database is unavailable", { cause });
  }
}
