/**
 * Typed errors thrown by services. The shared error handler reads
 * `statusCode` to pick the HTTP status, so services never touch replies.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Client sent a body that does not match the expected shape. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

export class MissingFieldError extends ValidationError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing required field: ${field}`);
    this.field = field;
  }
}

/** The random source could not produce the requested bytes. */
export class EntropySourceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}
