/**
 * Centralized error type definitions for the DF-e harvester
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Document extraction
  MALFORMED_INPUT = 'MALFORMED_INPUT',
  UNKNOWN_DOCUMENT_KIND = 'UNKNOWN_DOCUMENT_KIND',
  MISSING_FIELD = 'MISSING_FIELD',
  MALFORMED_TIMESTAMP = 'MALFORMED_TIMESTAMP',
  INVALID_ACCESS_KEY = 'INVALID_ACCESS_KEY',

  // Transport and local files
  DECODE_ERROR = 'DECODE_ERROR',
  FILE_READ_ERROR = 'FILE_READ_ERROR',

  // Infrastructure
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base class of every failure an extractor can surface.
 * The processor flattens these to the record's `error` string and logs the code.
 */
export class FiscalDocumentError extends AppError {
  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message, code, 422, true, context);
  }
}

export class MalformedInputError extends FiscalDocumentError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Malformed XML input: ${reason}`, ErrorCode.MALFORMED_INPUT, { reason });
    this.reason = reason;
  }
}

export class UnknownDocumentKindError extends FiscalDocumentError {
  public readonly rawTag: string;

  constructor(rawTag: string) {
    super(`Unrecognized fiscal document root tag: ${rawTag}`, ErrorCode.UNKNOWN_DOCUMENT_KIND, { rawTag });
    this.rawTag = rawTag;
  }
}

export class MissingFieldError extends FiscalDocumentError {
  public readonly kind: string;
  public readonly fieldName: string;

  constructor(kind: string, fieldName: string) {
    super(`Required field "${fieldName}" not found in ${kind} document`, ErrorCode.MISSING_FIELD, {
      kind,
      fieldName,
    });
    this.kind = kind;
    this.fieldName = fieldName;
  }
}

export class MalformedTimestampError extends FiscalDocumentError {
  public readonly rawValue: string;

  constructor(rawValue: string) {
    super(`Malformed timestamp: "${rawValue}"`, ErrorCode.MALFORMED_TIMESTAMP, { rawValue });
    this.rawValue = rawValue;
  }
}

export class InvalidAccessKeyError extends FiscalDocumentError {
  public readonly kind: string;
  public readonly rawValue: string;

  constructor(kind: string, rawValue: string) {
    super(`Access key "${rawValue}" in ${kind} document is not 44 digits`, ErrorCode.INVALID_ACCESS_KEY, {
      kind,
      rawValue,
    });
    this.kind = kind;
    this.rawValue = rawValue;
  }
}

/**
 * Raised by the transport decoder when a blob is not base64-encoded UTF-8 text
 */
export class DecodeError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.DECODE_ERROR, 422, true, context);
  }
}

/**
 * Raised when a local XML file cannot be read as a document
 */
export class DocumentFileError extends AppError {
  constructor(filePath: string, message: string, context?: Record<string, unknown>) {
    super(`${filePath}: ${message}`, ErrorCode.FILE_READ_ERROR, 422, true, { filePath, ...context });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, false, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Wrap anything thrown outside the AppError hierarchy as an INTERNAL_ERROR
 */
export function toAppError(error: unknown, prefix: string = 'Unexpected failure'): AppError {
  if (isAppError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AppError(`${prefix}: ${message}`, ErrorCode.INTERNAL_ERROR, 500, false);
}
