/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
  NO_CONTENT = 'NO_CONTENT',
  DOCUMENT_NOT_LOADED = 'DOCUMENT_NOT_LOADED',
  DOCUMENT_SOURCE_ERROR = 'DOCUMENT_SOURCE_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

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
 * The supplied bytes are not well-formed XML. No partial result is produced.
 */
export class MalformedDocumentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(`Malformed DATEX2 document: ${message}`, ErrorCode.MALFORMED_DOCUMENT, 422, true, context);
  }
}

/**
 * Parsing was requested without any content to parse.
 */
export class NoContentError extends AppError {
  constructor(message: string = 'No XML content to parse. Fetch or load a document first.', context?: Record<string, unknown>) {
    super(message, ErrorCode.NO_CONTENT, 400, true, context);
  }
}

/**
 * Situations were requested before a document was parsed.
 * This is a programming error, not a data problem.
 */
export class DocumentNotLoadedError extends AppError {
  constructor(message: string = 'XML not parsed. Call parseXml() first.') {
    super(message, ErrorCode.DOCUMENT_NOT_LOADED, 500, false);
  }
}

/**
 * A local document source could not be read.
 */
export class DocumentSourceError extends AppError {
  constructor(source: string, message: string, context?: Record<string, unknown>) {
    super(
      `Could not read DATEX2 document from ${source}: ${message}`,
      ErrorCode.DOCUMENT_SOURCE_ERROR,
      500,
      true,
      { source, ...context }
    );
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
