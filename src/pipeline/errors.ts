/**
 * Error taxonomy of the conversion pipeline
 */

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Source data is empty or unreadable. Fatal for the video.
 */
export class MalformedInputError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MalformedInputError';
  }
}

/**
 * A rewritten chunk is missing. Fatal for the video.
 */
export class AssemblyError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'AssemblyError';
  }
}

/**
 * Failure of a call to an external capability
 */
export class CallError extends PipelineError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'CallError';
    this.statusCode = statusCode;
  }

  toString(): string {
    return this.statusCode ? `${this.name}: ${this.message} (status: ${this.statusCode})` : `${this.name}: ${this.message}`;
  }
}

/**
 * Retryable call failure
 */
export class TransientCallError extends CallError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, statusCode, details);
    this.name = 'TransientCallError';
  }
}

/**
 * Call failure that retrying cannot fix (credentials, malformed request)
 */
export class PermanentCallError extends CallError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, statusCode, details);
    this.name = 'PermanentCallError';
  }
}

/**
 * Rate limit exceeded
 */
export class RateLimitError extends TransientCallError {
  /** Seconds the server asked us to wait */
  retryAfter?: number;

  constructor(message: string, retryAfter?: number, statusCode = 429) {
    super(message, statusCode);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Call did not finish in time
 */
export class TimeoutError extends TransientCallError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'TimeoutError';
  }
}

/**
 * Server error (5xx)
 */
export class ServerError extends TransientCallError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'ServerError';
  }
}

/**
 * Network connection error
 */
export class NetworkError extends TransientCallError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * The capability answered, but the answer failed validation
 */
export class RejectedOutputError extends TransientCallError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, undefined, details);
    this.name = 'RejectedOutputError';
  }
}

/**
 * Authentication failed
 */
export class AuthenticationError extends PermanentCallError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'AuthenticationError';
  }
}

/**
 * Request rejected as invalid
 */
export class InvalidRequestError extends PermanentCallError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Map an HTTP status to the matching error class
 */
export function errorFromStatus(statusCode: number, message: string, retryAfter?: number): CallError {
  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(message, statusCode);
  } else if (statusCode === 408) {
    return new TimeoutError(message, statusCode);
  } else if (statusCode === 429) {
    return new RateLimitError(message, retryAfter, statusCode);
  } else if (statusCode >= 500) {
    return new ServerError(message, statusCode);
  } else {
    return new InvalidRequestError(message, statusCode);
  }
}
