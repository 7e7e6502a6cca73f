/**
 * Svelte Compiler Adapter
 *
 * Wraps `svelte/compiler` behind the ComponentCompiler port. Styles are
 * always emitted externally so the server and client artifacts carry the
 * same stylesheet and nothing is injected at runtime.
 */

import { compile, type CompileOptions, type CompileResult } from 'svelte/compiler'
import {
  ComponentCompileError,
  type CompileOutput,
  type CompileRequest,
  type CompileTarget,
  type CompileWarning,
  type ComponentCompiler,
  type SourceLocation,
} from '@hydrant/runtime-core'

export type CompileFunction = (source: string, options: CompileOptions) => CompileResult

export interface SvelteCompilerOptions {
  /** Replaces `svelte/compiler`'s compile (tests) */
  compileFn?: CompileFunction
}

export class SvelteCompiler implements ComponentCompiler {
  private compileFn: CompileFunction

  constructor(options: SvelteCompilerOptions = {}) {
    this.compileFn = options.compileFn ?? compile
  }

  async compile(request: CompileRequest): Promise<CompileOutput> {
    let result: CompileResult
    try {
      result = this.compileFn(request.source, {
        generate: request.target,
        dev: request.dev,
        filename: componentFilename(request.identity),
        css: 'external',
      })
    } catch (error) {
      throw toCompileError(error, request.identity, request.target)
    }

    return {
      code: result.js.code,
      style: result.css?.code ?? '',
      warnings: result.warnings.map(toWarning),
    }
  }
}

/**
 * Filename handed to the compiler. The compiler derives the component's
 * constructor name from it, so it always ends in `.svelte`.
 */
export function componentFilename(identity: string): string {
  return identity.endsWith('.svelte') ? identity : `${identity}.svelte`
}

function toWarning(warning: CompileResult['warnings'][number]): CompileWarning {
  const result: CompileWarning = { code: warning.code, message: warning.message }
  if (warning.start) {
    result.line = warning.start.line
    result.column = warning.start.column
  }
  return result
}

function toCompileError(error: unknown, identity: string, target: CompileTarget): ComponentCompileError {
  if (!(error instanceof Error)) {
    return new ComponentCompileError(String(error), { identity, target })
  }

  return new ComponentCompileError(
    error.message,
    {
      identity,
      target,
      location: readLocation(error),
      frame: 'frame' in error && typeof error.frame === 'string' ? error.frame : undefined,
      compilerCode: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    },
    { cause: error }
  )
}

function readLocation(error: Error): SourceLocation | undefined {
  if (!('start' in error)) return undefined
  const start = error.start
  if (typeof start !== 'object' || start === null) return undefined
  if (!('line' in start) || !('column' in start)) return undefined
  if (typeof start.line !== 'number' || typeof start.column !== 'number') return undefined
  return { line: start.line, column: start.column }
}
