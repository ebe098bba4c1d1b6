import { HttpStatus } from "@nestjs/common";

export type DynamicFieldErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "FORBIDDEN"
  | "STORAGE_ERROR"
  | "PARSE_ERROR";

/**
 * Base class of every error raised by the dynamic field core. Each subclass
 * carries the HTTP status it maps to so the boundary never has to guess.
 */
export abstract class DynamicFieldError extends Error {
  abstract readonly code: DynamicFieldErrorCode;
  abstract readonly statusCode: HttpStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends DynamicFieldError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = HttpStatus.BAD_REQUEST;

  /**
   * @param field - the offending attribute, e.g. `name` or `config.PossibleValues`
   */
  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class NotFoundError extends DynamicFieldError {
  readonly code = "NOT_FOUND";
  readonly statusCode = HttpStatus.NOT_FOUND;
}

export class ConflictError extends DynamicFieldError {
  readonly code = "CONFLICT";
  readonly statusCode = HttpStatus.CONFLICT;
}

export class ForbiddenError extends DynamicFieldError {
  readonly code = "FORBIDDEN";
  readonly statusCode = HttpStatus.FORBIDDEN;
}

export class StorageError extends DynamicFieldError {
  readonly code = "STORAGE_ERROR";
  readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(readonly operation: string, cause: unknown) {
    super(`${operation}: ${errorMessage(cause)}`, { cause });
  }
}

export class ParseError extends DynamicFieldError {
  readonly code = "PARSE_ERROR";
  readonly statusCode = HttpStatus.BAD_REQUEST;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
