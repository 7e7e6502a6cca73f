/**
 * Base Error Classes
 *
 * Error hierarchy shared by the compiler adapter, the sandbox and the HTTP layer.
 */

export interface ErrorContext {
  [key: string]: unknown
}

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    Object.setPrototypeOf(this, new.target.prototype)

    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.isOperational = isOperational
    this.context = context

    Error.captureStackTrace(this)
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    }
  }
}

/**
 * Validation Error - 400
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, true, context)
  }
}

/**
 * Not Found Error - 404
 */
export class NotFoundError extends AppError {
  constructor(resource: string, context?: ErrorContext) {
    super(`${resource} not found`, 'NOT_FOUND', 404, true, context)
  }
}

/**
 * Configuration Error - 500
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', 500, false, context, options)
  }
}

/**
 * Check if an error is an operational error (expected/handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational
  }
  return false
}
