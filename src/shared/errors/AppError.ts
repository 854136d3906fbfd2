/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the error handler:
 *
 *   1. Operational errors — expected problems: a bad query parameter, the
 *      upstream catalog answering 503, a lookup that finds nothing. They carry
 *      a status code and a message that is safe to show the caller.
 *
 *   2. Programmer errors — anything else. The handler answers 500 and logs.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for every subclass whatever the compilation target.
 *
 * The upstream errors (TransportError, UnexpectedStatusError, DecodeError)
 * map to 502/504: the fault is on the far side of the gateway, not in the
 * caller's request.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
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

/** The request never produced a response: DNS, connect, reset, abort. */
export class TransportError extends AppError {
  constructor(message: string, cause?: unknown, statusCode = 502) {
    super(message, statusCode, true, cause === undefined ? undefined : { cause });
  }
}

/** The call was aborted by the caller's signal or by the client timeout. */
export class RequestCancelledError extends TransportError {
  public readonly reason: 'aborted' | 'timeout';

  constructor(reason: 'aborted' | 'timeout', url: string, cause?: unknown) {
    super(
      reason === 'timeout' ? `Request timed out: ${url}` : `Request cancelled: ${url}`,
      cause,
      504,
    );
    this.reason = reason;
  }
}

/** The upstream answered outside 200–299. */
export class UnexpectedStatusError extends AppError {
  public readonly status: number;
  public readonly statusText: string;

  constructor(status: number, statusText: string) {
    super(`Unexpected upstream status: ${status} ${statusText}`.trimEnd(), 502);
    this.status = status;
    this.statusText = statusText;
  }
}

/** The upstream body was not JSON, or not the result-collection shape. */
export class DecodeError extends AppError {
  constructor(message: string) {
    super(`Failed to decode upstream response: ${message}`, 502);
  }
}
