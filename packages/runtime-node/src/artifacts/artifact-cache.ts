/**
 * Artifact Cache
 *
 * Content-addressed store of compiled artifacts, keyed by component identity,
 * target and the SHA-256 fingerprint of the source text. One entry is kept
 * per (identity, target): a new fingerprint replaces the old entry, while
 * concurrent requests for the same fingerprint share one compilation.
 */

import { createHash } from 'node:crypto'
import {
  prepareArtifact,
  silentLogger,
  type ArtifactStore,
  type CompileTarget,
  type CompiledArtifact,
  type ComponentCompiler,
  type Logger,
} from '@hydrant/runtime-core'

export interface ArtifactCacheOptions {
  compiler: ComponentCompiler
  dev?: boolean
  logger?: Logger
}

export interface ArtifactCacheStats {
  entries: number
  hits: number
  misses: number
  compilations: number
  failures: number
}

interface CacheEntry {
  fingerprint: string
  artifact: Promise<CompiledArtifact>
}

export function fingerprint(sourceText: string): string {
  return createHash('sha256').update(sourceText, 'utf8').digest('hex')
}

export class ArtifactCache implements ArtifactStore {
  private entries = new Map<string, CacheEntry>()
  private compiler: ComponentCompiler
  private dev: boolean
  private logger: Logger
  private counters = { hits: 0, misses: 0, compilations: 0, failures: 0 }

  constructor(options: ArtifactCacheOptions) {
    this.compiler = options.compiler
    this.dev = options.dev ?? false
    this.logger = options.logger ?? silentLogger
  }

  getOrCompile(identity: string, target: CompileTarget, sourceText: string): Promise<CompiledArtifact> {
    const key = cacheKey(identity, target)
    const digest = fingerprint(sourceText)
    const existing = this.entries.get(key)

    if (existing && existing.fingerprint === digest) {
      this.counters.hits++
      return existing.artifact
    }

    this.counters.misses++
    const artifact: Promise<CompiledArtifact> = this.compile(identity, target, sourceText, digest).catch(
      (error: unknown) => {
        // Failures are not cached; the next request compiles again
        if (this.entries.get(key)?.artifact === artifact) {
          this.entries.delete(key)
        }
        this.counters.failures++
        throw error
      }
    )

    this.entries.set(key, { fingerprint: digest, artifact })
    return artifact
  }

  /**
   * Drop cached artifacts for one identity, or everything
   */
  invalidate(identity?: string): void {
    if (identity === undefined) {
      this.entries.clear()
      return
    }
    for (const target of ['server', 'client'] as const) {
      this.entries.delete(cacheKey(identity, target))
    }
  }

  stats(): ArtifactCacheStats {
    return { entries: this.entries.size, ...this.counters }
  }

  private async compile(
    identity: string,
    target: CompileTarget,
    source: string,
    digest: string
  ): Promise<CompiledArtifact> {
    this.counters.compilations++
    const started = Date.now()

    const output = await this.compiler.compile({ source, identity, target, dev: this.dev })
    const prepared = prepareArtifact(output.code, target)

    for (const warning of output.warnings) {
      this.logger.warn(`${identity}: ${warning.message}`, { code: warning.code, target, line: warning.line })
    }
    this.logger.debug(`Compiled ${identity} for ${target}`, {
      fingerprint: digest.slice(0, 12),
      durationMs: Date.now() - started,
    })

    return Object.freeze({
      identity,
      target,
      code: output.code,
      style: output.style,
      fingerprint: digest,
      prepared: Object.freeze(prepared),
      warnings: output.warnings,
    })
  }
}

function cacheKey(identity: string, target: CompileTarget): string {
  return `${target}:${identity}`
}
