/**
 * Render Errors
 *
 * Failures of a single render. None of these are retried: given the same
 * source and the same data they fail the same way again.
 */

import { AppError, type ErrorContext } from './base-error.js'
import type { CompileTarget } from '../types/render.js'

export interface SourceLocation {
  line: number
  column: number
}

/**
 * The external compiler rejected a component's source
 */
export class ComponentCompileError extends AppError {
  public readonly identity: string
  public readonly target: CompileTarget
  public readonly location?: SourceLocation
  public readonly frame?: string

  constructor(
    message: string,
    details: {
      identity: string
      target: CompileTarget
      location?: SourceLocation
      frame?: string
      compilerCode?: string
    },
    options?: { cause?: unknown }
  ) {
    const context: ErrorContext = {
      identity: details.identity,
      target: details.target,
    }
    if (details.location) context.location = details.location
    if (details.compilerCode) context.compilerCode = details.compilerCode

    super(message, 'COMPILE_ERROR', 500, true, context, options)
    this.identity = details.identity
    this.target = details.target
    this.location = details.location
    this.frame = details.frame
  }
}

/**
 * The server artifact threw (or ran out of time) inside the sandbox
 */
export class ComponentRuntimeError extends AppError {
  public readonly identity: string
  /** Stack of the script error that caused the failure, for diagnostics */
  public readonly scriptStack?: string

  constructor(message: string, identity: string, options?: { cause?: unknown; scriptStack?: string }) {
    super(message, 'RENDER_ERROR', 500, true, { identity }, { cause: options?.cause })
    this.identity = identity
    this.scriptStack = options?.scriptStack
  }
}

/**
 * Generated code expects a runtime primitive, module or context accessor that
 * the emulation layer did not install. Signals a compiler/runtime version
 * mismatch and is never stubbed over.
 */
export class MissingAccessorError extends AppError {
  public readonly accessor: string

  constructor(accessor: string, message?: string, context?: ErrorContext) {
    super(
      message ?? `Generated code expects "${accessor}" but the runtime bridge does not provide it`,
      'MISSING_ACCESSOR',
      500,
      false,
      { accessor, ...context }
    )
    this.accessor = accessor
  }
}

/**
 * Controller data that cannot be serialized faithfully to JSON
 */
export class ContextSerializationError extends AppError {
  public readonly path: string

  constructor(source: 'componentData' | 'documentMetadata', path: string, reason: string) {
    super(
      `${source} is not JSON-representable at ${path}: ${reason}`,
      'UNSERIALIZABLE_CONTEXT',
      500,
      true,
      { source, path, reason }
    )
    this.path = path
  }
}
