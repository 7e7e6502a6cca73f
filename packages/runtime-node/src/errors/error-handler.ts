/**
 * Error Handler
 *
 * Centralized error handling with request tracking and logging. Browsers get
 * an HTML error page; clients asking for JSON get a JSON body.
 */

import { AppError, DocumentWrapper, ErrorSanitizer, isOperationalError, type Logger } from '@hydrant/runtime-core'
import type { Context } from 'hono'

export interface ErrorHandlerOptions {
  sanitizer: ErrorSanitizer
  logger?: Logger
  wrapper?: DocumentWrapper
  onError?: (error: Error, request: Request) => void | Promise<void>
}

export class ErrorHandler {
  private wrapper: DocumentWrapper

  constructor(private options: ErrorHandlerOptions) {
    this.wrapper = options.wrapper ?? new DocumentWrapper()
  }

  /**
   * Handle errors and produce a Response
   */
  async handle(error: Error, request: Request): Promise<Response> {
    const requestId = readRequestId(request)
    const { sanitizer } = this.options

    // Log the error
    if (sanitizer.shouldLog(error)) {
      const logContext = {
        requestId,
        method: request.method,
        url: request.url,
        operational: isOperationalError(error),
        ...sanitizer.getLogDetails(error),
      }

      if (this.options.logger) {
        this.options.logger.error('Request error', logContext)
      } else {
        console.error('Request error:', logContext)
      }
    }

    // Call custom error handler if provided
    if (this.options.onError) {
      try {
        await this.options.onError(error, request)
      } catch (err) {
        console.error('Error in custom error handler:', err)
      }
    }

    const statusCode = sanitizer.getStatusCode(error)
    const sanitized = sanitizer.sanitize(error)

    if (wantsJson(request)) {
      return Response.json(
        {
          error: {
            message: sanitized.message,
            code: error instanceof AppError ? error.code : sanitized.code || 'INTERNAL_ERROR',
            statusCode,
            requestId,
          },
        },
        {
          status: statusCode,
          headers: { 'X-Request-ID': requestId },
        }
      )
    }

    return new Response(this.wrapper.renderErrorPage(sanitized, requestId), {
      status: statusCode,
      headers: {
        'Content-Type': 'text/html; charset=utf-8',
        'X-Request-ID': requestId,
      },
    })
  }

  /**
   * Adapter for Hono's onError hook
   */
  toHonoHandler() {
    return async (error: Error, c: Context) => {
      return this.handle(error, c.req.raw)
    }
  }
}

function readRequestId(request: Request): string {
  const assigned: unknown = Reflect.get(request, 'requestId')
  if (typeof assigned === 'string' && assigned) return assigned
  return request.headers.get('x-request-id') || 'unknown'
}

function wantsJson(request: Request): boolean {
  const accept = request.headers.get('accept') ?? ''
  return accept.includes('application/json') && !accept.includes('text/html')
}
