/**
 * Centralized error type definitions for the document search pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Connection failure, timeout or non-2xx response while fetching a page or document.
 * Recoverable: the affected page or document is skipped.
 */
export class TransportError extends AppError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, cause: unknown, statusCode?: number) {
    const reason = statusCode !== undefined
      ? `HTTP ${statusCode}`
      : cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch ${url}: ${reason}`, ErrorCode.TRANSPORT_ERROR, true, { url, statusCode }, { cause });
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Payload could not be parsed as a document at all
 */
export class DocumentParseError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.DOCUMENT_UNREADABLE, true, undefined, { cause });
  }
}

/**
 * Misconfiguration that makes the whole operation impossible (e.g. no listing URLs)
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, false, context);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, true, context);
  }
}

export class SearchCancelledError extends AppError {
  constructor(processed: number, total: number) {
    super(`Search cancelled after ${processed}/${total} documents`, ErrorCode.SEARCH_CANCELLED, true, { processed, total });
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  DOCUMENT_UNREADABLE = 'DOCUMENT_UNREADABLE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  SEARCH_CANCELLED = 'SEARCH_CANCELLED',
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
