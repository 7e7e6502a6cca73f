/**
 * Error Sanitizer
 *
 * Keeps stack traces, file paths and secrets out of what the browser sees.
 * Development keeps the message and stack (paths masked); production gets a
 * generic message per status code.
 */

import { AppError } from '../errors/base-error.js'
import {
  ComponentCompileError,
  ComponentRuntimeError,
} from '../errors/render-errors.js'

export interface SanitizedError {
  error: string
  message: string
  code?: string
  statusCode: number
  /** Development only */
  stack?: string
  /** Development only: compiler code frame */
  frame?: string
}

export class ErrorSanitizer {
  private isDevelopment: boolean

  constructor(isDevelopment = false) {
    this.isDevelopment = isDevelopment
  }

  get development(): boolean {
    return this.isDevelopment
  }

  /**
   * Sanitize error for client response
   */
  sanitize(error: unknown, defaultMessage = 'An error occurred'): SanitizedError {
    if (this.isDevelopment) {
      return this.sanitizeForDevelopment(error, defaultMessage)
    }

    return this.sanitizeForProduction(error, defaultMessage)
  }

  /**
   * Sanitize for production (minimal information)
   */
  private sanitizeForProduction(error: unknown, defaultMessage: string): SanitizedError {
    if (error instanceof Error) {
      const statusCode = this.getStatusCode(error)
      const safeMessage = this.getSafeMessage(error, defaultMessage)

      return {
        error: this.getErrorType(statusCode),
        message: safeMessage,
        statusCode,
      }
    }

    return {
      error: 'Internal Server Error',
      message: defaultMessage,
      statusCode: 500,
    }
  }

  /**
   * Sanitize for development (full diagnostics, secrets still masked)
   */
  private sanitizeForDevelopment(error: unknown, defaultMessage: string): SanitizedError {
    if (error instanceof Error) {
      const statusCode = this.getStatusCode(error)
      const message = this.removeSensitivePatterns(error.message || defaultMessage)

      const sanitized: SanitizedError = {
        error: error.name || this.getErrorType(statusCode),
        message,
        code: error instanceof AppError ? error.code : undefined,
        statusCode,
      }

      const stack = error instanceof ComponentRuntimeError && error.scriptStack
        ? error.scriptStack
        : error.stack
      if (stack) {
        sanitized.stack = this.maskSecrets(stack)
      }

      if (error instanceof ComponentCompileError && error.frame) {
        sanitized.frame = error.frame
      }

      return sanitized
    }

    return {
      error: 'Error',
      message: String(error || defaultMessage),
      statusCode: 500,
    }
  }

  /**
   * Get HTTP status code from error
   */
  getStatusCode(error: unknown): number {
    if (error instanceof AppError) {
      return error.statusCode
    }

    if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode
    }

    if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
      return error.status
    }

    return 500
  }

  /**
   * Get safe error message
   */
  private getSafeMessage(error: Error, defaultMessage: string): string {
    const statusCode = this.getStatusCode(error)

    // For known client errors, allow message through (but sanitized)
    if (statusCode >= 400 && statusCode < 500) {
      const message = this.removeSensitivePatterns(error.message || defaultMessage)

      if (!message.trim()) {
        return this.getDefaultMessage(statusCode)
      }

      return message
    }

    // For server errors, use generic message
    return this.getDefaultMessage(statusCode)
  }

  /**
   * Get default message for status code
   */
  getDefaultMessage(statusCode: number): string {
    const messages: Record<number, string> = {
      400: 'Bad Request',
      404: 'Not found',
      500: 'Internal server error',
      503: 'Service unavailable',
    }

    return messages[statusCode] || 'An error occurred'
  }

  /**
   * Get error type name
   */
  private getErrorType(statusCode: number): string {
    if (statusCode >= 400 && statusCode < 500) {
      return 'Client Error'
    }

    if (statusCode >= 500) {
      return 'Server Error'
    }

    return 'Error'
  }

  /**
   * Remove sensitive patterns from error messages
   */
  private removeSensitivePatterns(message: string): string {
    // Remove stack trace indicators
    message = message.replace(/at\s+\w+\s+\([^)]+\)/g, '')
    message = message.replace(/at\s+[^\s]+:\d+:\d+/g, '')

    return this.maskSecrets(message).trim()
  }

  /**
   * Mask absolute paths, tokens and addresses. Stack frames stay readable.
   */
  private maskSecrets(text: string): string {
    // Absolute paths of server files
    text = text.replace(/(?:file:\/\/)?\/(?:[\w.@-]+\/)+([\w.@-]+\.(?:ts|js|mjs|cjs|json|svelte))/g, '[PATH]/$1')
    text = text.replace(/[A-Z]:\\[^\s:)]+/g, '[PATH]')

    // Remove connection strings
    text = text.replace(/(?:mongodb|postgres|mysql|redis):\/\/[^\s]+/gi, '[CONNECTION]')

    // Remove API keys and tokens
    text = text.replace(/[a-f0-9]{32,}/gi, '[TOKEN]')
    text = text.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN]')

    // Remove email addresses
    text = text.replace(/[^\s@]+@[^\s@]+\.[^\s@]+/g, '[EMAIL]')

    // Remove IP addresses
    text = text.replace(/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, '[IP]')

    return text
  }

  /**
   * Check if error should be logged (vs just returned to client)
   */
  shouldLog(error: unknown): boolean {
    const statusCode = this.getStatusCode(error)

    // Log all 5xx errors
    return statusCode >= 500
  }

  /**
   * Get full error details for logging (not for client)
   */
  getLogDetails(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
      const details: Record<string, unknown> = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      }
      if (error instanceof AppError) {
        details.code = error.code
        details.context = error.context
      }
      if (error instanceof ComponentRuntimeError && error.scriptStack) {
        details.scriptStack = error.scriptStack
      }
      if (error.cause !== undefined) {
        details.cause = error.cause instanceof Error ? error.cause.message : error.cause
      }
      return details
    }

    return {
      error: String(error),
    }
  }
}
