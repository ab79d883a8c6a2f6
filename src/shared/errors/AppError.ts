/**
 * Structured error details
 */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public details?: ErrorDetails;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: ErrorDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: Date;
  details?: ErrorDetails;
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

/**
 * The input URL matches none of the known post URL shapes
 */
export class InvalidUrlFormatError extends AppError {
  constructor(public readonly url: string) {
    super(
      `Cannot extract a post id from URL: ${url}`,
      'INVALID_URL_FORMAT',
      400,
      true,
      { url }
    );
  }
}

/**
 * The media API answered with a non-success status
 */
export class UpstreamHttpError extends AppError {
  constructor(
    public readonly status: number,
    message: string = `Upstream responded with HTTP ${status}`,
    details?: ErrorDetails
  ) {
    super(message, 'UPSTREAM_HTTP_ERROR', 502, true, { ...details, status });
  }
}

/**
 * The post was fetched but carries neither a video nor photos
 */
export class NoMediaFoundError extends AppError {
  constructor(postId?: string) {
    super(
      'No video or images were found in this post',
      'NO_MEDIA_FOUND',
      404,
      true,
      postId ? { postId } : undefined
    );
  }
}

/**
 * Network error
 */
export class NetworkError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'NETWORK_ERROR', 503, true, details);
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends AppError {
  constructor(operation: string, timeout: number) {
    super(
      `Operation '${operation}' timed out after ${timeout}ms`,
      'TIMEOUT',
      504,
      true,
      { operation, timeout }
    );
  }
}

/**
 * The caller aborted an in-flight request
 */
export class RequestAbortedError extends AppError {
  constructor(url: string) {
    super(`Request to ${url} was aborted`, 'REQUEST_ABORTED', 499, true, { url });
  }
}

/**
 * Internal server error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: ErrorDetails) {
    super(message, 'INTERNAL_ERROR', 500, false, details);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', 500, false, details);
  }
}
