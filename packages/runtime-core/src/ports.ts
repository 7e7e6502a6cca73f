/**
 * Platform Ports
 *
 * Interfaces the platform adapters implement. Nothing here touches Node.js
 * or the DOM, so the same contracts hold for the server runtime and for the
 * browser-side hydrator.
 */

import type {
  CompileOutput,
  CompileTarget,
  CompiledArtifact,
  ComponentSource,
} from './types/render.js'

// =============================================================================
// Compiler Port
// =============================================================================

export interface CompileRequest {
  source: string
  identity: string
  target: CompileTarget
  dev: boolean
}

export interface ComponentCompiler {
  /**
   * Compile one component for one target. Rejects with ComponentCompileError.
   */
  compile(request: CompileRequest): Promise<CompileOutput>;
}

// =============================================================================
// Artifact Store Port
// =============================================================================

export interface ArtifactStore {
  /**
   * Return the artifact for (identity, target, fingerprint(sourceText)),
   * compiling on a miss. Compile errors propagate unchanged.
   */
  getOrCompile(identity: string, target: CompileTarget, sourceText: string): Promise<CompiledArtifact>;
}

// =============================================================================
// Component Source Port
// =============================================================================

export interface ComponentSourceReader {
  /**
   * Read the current text of a component. Each call re-reads, so edits are
   * picked up and re-fingerprinted.
   */
  read(identity: string): Promise<ComponentSource>;
}

// =============================================================================
// Logger Port
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/**
 * Console-backed logger with a level threshold
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = ''): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]
  const tag = (label: string) => (prefix ? `[${prefix}] [${label}]` : `[${label}]`)

  return {
    debug: (message, meta) => {
      if (enabled('debug')) console.log(tag('DEBUG'), message, meta || '')
    },
    info: (message, meta) => {
      if (enabled('info')) console.log(tag('INFO'), message, meta || '')
    },
    warn: (message, meta) => {
      if (enabled('warn')) console.warn(tag('WARN'), message, meta || '')
    },
    error: (message, meta) => {
      if (enabled('error')) console.error(tag('ERROR'), message, meta || '')
    },
  }
}

/**
 * Logger that discards everything (tests, embedded use)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
