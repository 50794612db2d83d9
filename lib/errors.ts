/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new CorruptDocumentError("Could not parse PDF", { path })
 *   throw new EmptyDatabaseError() // Uses default message
 *
 * Errors marked `fatal` abort the whole run. Everything else is caught at the
 * document or page boundary and recorded in the run report:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     if (appError.fatal) throw appError
 *     report.errors.push(appError.toJSON())
 *   }
 */

export type ErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "CORRUPT_DOCUMENT"
  | "OCR_FAILURE"
  | "ANNOTATION_ERROR"
  | "EMPTY_DATABASE"
  | "EMPTY_INPUT"
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
  pageIndex?: number
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly fatal: boolean = false,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Unknown extension and unknown file signature. Fatal to one document.
 */
export class UnsupportedFormatError extends AppError {
  constructor(message = "Unsupported document format") {
    super("UNSUPPORTED_FORMAT", message)
  }
}

/**
 * The file claims a known format but cannot be parsed. Fatal to one document.
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "Document could not be parsed", details?: ErrorDetail[]) {
    super("CORRUPT_DOCUMENT", message, false, details)
  }
}

/**
 * OCR could not recover text for a page. The page is marked `ocr-incomplete`.
 */
export class OcrFailureError extends AppError {
  constructor(
    public readonly pageIndex: number,
    message = "OCR failed"
  ) {
    super("OCR_FAILURE", message)
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), pageIndex: this.pageIndex }
  }
}

/**
 * Overlays for one page could not be written. The rest of the document is
 * still annotated.
 */
export class AnnotationError extends AppError {
  constructor(
    public readonly pageIndex: number,
    message = "Annotation failed"
  ) {
    super("ANNOTATION_ERROR", message)
  }

  override toJSON(): SerializedError {
    return { ...super.toJSON(), pageIndex: this.pageIndex }
  }
}

/**
 * No source table produced a usable entry.
 */
export class EmptyDatabaseError extends AppError {
  constructor(message = "No valid regulatory source tables were found") {
    super("EMPTY_DATABASE", message, true)
  }
}

/**
 * The solicitation directory holds no PDF or DOCX files.
 */
export class EmptyInputError extends AppError {
  constructor(message = "No solicitation documents were found") {
    super("EMPTY_INPUT", message, true)
  }
}

/**
 * Configuration file missing, unreadable or invalid.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, true, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ConfigurationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ConfigurationError("Invalid configuration", details)
  }
}

/**
 * Unexpected failure wrapped by toAppError.
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message)
  }

  return new InternalError(String(error))
}
