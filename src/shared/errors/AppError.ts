/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors:
 *
 *   1. Operational errors — expected problems such as "no entity matches this
 *      name" or "record is 1439 columns wide". They carry a proper HTTP status
 *      (404, 400, 422) and a message that is safe to show a client.
 *
 *   2. Programmer errors — a broken record layout, a bug. They get a generic
 *      500 and are logged for debugging.
 *
 * The `isOperational` flag distinguishes the two; the global error handler
 * (errorHandler.ts) reads it.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses across compilation targets.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * Invalid record layout. Raised only while a FieldLayout is being built or
 * queried, never while a record is being encoded or decoded.
 */
export class LayoutError extends AppError {
  constructor(message: string) {
    super(`Invalid record layout: ${message}`, 500, false);
  }
}

export type FormatErrorKind = 'LengthMismatch';

/** A single input record that cannot be decoded. Reported per record. */
export class FormatError extends AppError {
  public readonly kind: FormatErrorKind;
  public readonly expected: number;
  public readonly actual: number;
  public readonly lineNumber: number | null;

  constructor(kind: FormatErrorKind, expected: number, actual: number, lineNumber: number | null = null) {
    const where = lineNumber === null ? '' : ` on line ${lineNumber}`;
    super(`${kind}: expected a record of ${expected} columns, got ${actual}${where}`, 422);
    this.kind = kind;
    this.expected = expected;
    this.actual = actual;
    this.lineNumber = lineNumber;
  }

  /** Same error, pinned to a line of the batch file. */
  atLine(lineNumber: number): FormatError {
    return new FormatError(this.kind, this.expected, this.actual, lineNumber);
  }
}
