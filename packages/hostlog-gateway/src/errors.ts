// Error taxonomy for request handling. Every class maps to one HTTP status.

export class ApiError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, statusCode: number, message: string) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Missing or malformed required field. */
export class ValidationError extends ApiError {
  readonly field?: string;

  constructor(message: string, options?: { field?: string; code?: string }) {
    super(options?.code ?? "bad_request", 400, message);
    this.name = "ValidationError";
    this.field = options?.field;
  }

  static missing(field: string) {
    return new ValidationError(`Missing Required Argument: ${field}`, { field });
  }
}

/** Malformed pagination parameter. */
export class InvalidArgumentError extends ValidationError {
  constructor(field: string, value: string) {
    super(`Invalid value for ${field}: ${value}`, { field, code: "invalid_argument" });
    this.name = "InvalidArgumentError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super("not_found", 404, message);
    this.name = "NotFoundError";
  }
}

/**
 * Uniqueness or referential-integrity violation reported by the store,
 * carrying the driver message.
 */
export class ConflictError extends ApiError {
  readonly constraintCode: string;

  constructor(message: string, constraintCode: string) {
    super("conflict", 409, message);
    this.name = "ConflictError";
    this.constraintCode = constraintCode;
  }
}
