/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors:
 *
 *   1. Operational - expected problems such as a missing request field. The
 *      global error handler sends the error's statusCode and message.
 *   2. Programmer - anything else. Logged, answered with a generic 500.
 *
 * `isOperational` tells them apart.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses when compiled down to older targets.
 *
 * Upstream registry failures are not errors in this hierarchy at all: the
 * registry client returns them as values (see IRegistryClient).
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

/**
 * A single search candidate could not be turned into a result. Raised and
 * caught inside the per-candidate loop; never reaches a client.
 */
export class PartialProcessingError extends AppError {
  constructor(
    message: string,
    public readonly candidateIndex: number,
  ) {
    super(message, 502);
  }
}
