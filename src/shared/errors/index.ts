/**
 * Structured error classes
 * Every failure the indexing and retrieval pipeline reports is a StructuredError
 * carrying a stable code, a severity and a loggable context.
 */

export enum ErrorCode {
  // Document loading
  LOAD_ERROR = 'LOAD_ERROR',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',

  // Embedding model
  EMBEDDING_ERROR = 'EMBEDDING_ERROR',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',

  // Persistent store
  STORE_ERROR = 'STORE_ERROR',

  // Model / configuration consistency
  CONFIG_MISMATCH = 'CONFIG_MISMATCH',
  CONFIG_ERROR = 'CONFIG_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Network/Service Errors
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  RATE_LIMIT_ERROR = 'RATE_LIMIT_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  CONNECTION_ERROR = 'CONNECTION_ERROR',

  // Lifecycle
  INITIALIZATION_ERROR = 'INITIALIZATION_ERROR',

  // Control flow
  CANCELLED = 'CANCELLED',

  // Generic Errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL'

export interface ErrorContext {
  operation?: string
  documentId?: string
  filePath?: string
  query?: string
  component?: string
  timestamp?: Date
  [key: string]: unknown
}

export interface SerializedError {
  name: string
  message: string
  code: ErrorCode
  severity: ErrorSeverity
  context: ErrorContext
  retryable: boolean
  timestamp: Date
  cause?: string
  stack?: string
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly context: ErrorContext
  public readonly retryable: boolean
  public readonly timestamp: Date
  public override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = 'HIGH',
    context: ErrorContext = {},
    cause?: Error,
    retryable = false
  ) {
    super(message)
    this.name = 'StructuredError'
    this.code = code
    this.severity = severity
    this.timestamp = new Date()
    this.context = { ...context, timestamp: this.timestamp }
    this.retryable = retryable
    this.cause = cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      retryable: this.retryable,
      timestamp: this.timestamp,
      cause: this.cause?.message,
      stack: this.stack,
    }
  }
}

export type LoadFailureReason = 'unsupported' | 'unreadable'

/**
 * A source file that could not be read or converted. Reported, then skipped.
 */
export class LoadError extends StructuredError {
  constructor(
    message: string,
    public readonly documentId: string,
    public readonly reason: LoadFailureReason,
    originalError?: Error
  ) {
    super(
      message,
      reason === 'unsupported' ? ErrorCode.UNSUPPORTED_FORMAT : ErrorCode.LOAD_ERROR,
      'MEDIUM',
      { documentId, operation: 'load', originalError: originalError?.message },
      originalError
    )
    this.name = 'LoadError'
  }
}

/**
 * Embedding model call failed. Retryable unless the circuit is open.
 */
export class EmbeddingError extends StructuredError {
  constructor(
    message: string,
    model: string,
    originalError?: Error,
    options: { code?: ErrorCode; retryable?: boolean } = {}
  ) {
    super(
      message,
      options.code ?? ErrorCode.EMBEDDING_ERROR,
      'HIGH',
      { model, originalError: originalError?.message },
      originalError,
      options.retryable ?? true
    )
    this.name = 'EmbeddingError'
  }
}

/**
 * Transaction or connectivity failure in the persistent store
 */
export class StoreError extends StructuredError {
  constructor(message: string, operation: string, context: ErrorContext = {}, originalError?: Error) {
    super(
      message,
      ErrorCode.STORE_ERROR,
      'HIGH',
      { ...context, operation, originalError: originalError?.message },
      originalError
    )
    this.name = 'StoreError'
  }
}

/**
 * Query model differs from the indexed model, or a store was opened with a different dimension
 */
export class ConfigMismatchError extends StructuredError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_MISMATCH, 'HIGH', context)
    this.name = 'ConfigMismatchError'
  }
}

export class ValidationError extends StructuredError {
  constructor(message: string, field: string, context: ErrorContext = {}) {
    super(message, ErrorCode.VALIDATION_ERROR, 'MEDIUM', { ...context, field })
    this.name = 'ValidationError'
  }
}

export class CancellationError extends StructuredError {
  constructor(operation: string) {
    super(`Operation '${operation}' was cancelled`, ErrorCode.CANCELLED, 'LOW', { operation })
    this.name = 'CancellationError'
  }
}

export class TimeoutError extends StructuredError {
  constructor(operation: string, timeoutMs: number, context: ErrorContext = {}) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      ErrorCode.TIMEOUT_ERROR,
      'MEDIUM',
      { ...context, operation, timeoutMs },
      undefined,
      true
    )
    this.name = 'TimeoutError'
  }
}

/**
 * Configuration related errors
 */
export class ConfigurationError extends StructuredError {
  constructor(message: string, configKey: string, public readonly problems: string[] = []) {
    super(message, ErrorCode.CONFIG_ERROR, 'CRITICAL', { configKey, problems })
    this.name = 'ConfigurationError'
  }
}

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.EMBEDDING_ERROR,
  ErrorCode.TIMEOUT_ERROR,
  ErrorCode.RATE_LIMIT_ERROR,
  ErrorCode.SERVICE_UNAVAILABLE,
  ErrorCode.CONNECTION_ERROR,
])

/**
 * Error utility functions
 */
export class ErrorUtils {
  static isRetryable(error: unknown): boolean {
    if (error instanceof StructuredError) {
      return error.retryable && RETRYABLE_CODES.has(error.code)
    }
    if (!(error instanceof Error)) return false

    const retryableMessages = ['timeout', 'rate limit', 'service unavailable', 'econnrefused', 'econnreset', 'network']
    const message = error.message.toLowerCase()
    return retryableMessages.some((msg) => message.includes(msg))
  }

  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
  }

  static message(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
  }

  static codeOf(error: unknown): ErrorCode {
    return error instanceof StructuredError ? error.code : ErrorCode.UNKNOWN_ERROR
  }

  /**
   * Remove sensitive information from error
   */
  static sanitize(error: StructuredError): SerializedError {
    const sanitized = error.toJSON()
    const context: ErrorContext = { ...sanitized.context }

    delete context['apiKey']
    delete context['password']
    delete context['token']
    delete context['secret']

    return { ...sanitized, context }
  }
}
