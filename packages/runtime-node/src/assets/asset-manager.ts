/**
 * Asset Manager
 *
 * Serves everything under `/assets/`: the client runtime bundle the
 * hydration bootstrap imports, the stylesheets extracted from components,
 * and the project's static files.
 */

import path from 'node:path'
import { promises as fs } from 'node:fs'
import { createHash } from 'node:crypto'
import { createRequire } from 'node:module'
import { fileURLToPath } from 'node:url'
import { build } from 'esbuild'
import { CLIENT_RUNTIME_MODULES, silentLogger, type Logger } from '@hydrant/runtime-core'
import type { StyleRegistry } from '../render/page-renderer.js'

export const ASSET_PREFIX = '/assets/'
export const RUNTIME_BUNDLE = 'runtime.js'

export interface AssetManagerOptions {
  /** Project directory served for anything that is not generated */
  publicDir?: string
  /** Prebuilt runtime bundle written by `hydrant build` */
  prebuiltRuntime?: string
  dev?: boolean
  clientModules?: readonly string[]
  logger?: Logger
}

export interface ServedAsset {
  body: string | Uint8Array
  contentType: string
}

const here = path.dirname(fileURLToPath(import.meta.url))

export class AssetManager implements StyleRegistry {
  private styles = new Map<string, string>()
  private runtime?: Promise<string>
  private options: AssetManagerOptions
  private logger: Logger

  constructor(options: AssetManagerOptions = {}) {
    this.options = options
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Publish a component stylesheet under a content-hashed name
   */
  registerStyle(identity: string, css: string): string {
    const slug = identity.replace(/\.svelte$/, '').replace(/[^A-Za-z0-9_-]+/g, '-')
    const hash = createHash('sha256').update(css).digest('hex').slice(0, 10)
    const name = `${slug}.${hash}.css`
    this.styles.set(name, css)
    return `${ASSET_PREFIX}css/${name}`
  }

  getStyle(name: string): string | undefined {
    return this.styles.get(name)
  }

  /**
   * The client runtime bundle (built once, on first request)
   */
  getRuntimeBundle(): Promise<string> {
    if (!this.runtime) {
      this.runtime = this.loadRuntime().catch((error: unknown) => {
        this.runtime = undefined
        throw error
      })
    }
    return this.runtime
  }

  /**
   * Resolve a request path below `/assets/`. Returns null when nothing
   * matches, including paths that try to leave the public directory.
   */
  async resolve(requestPath: string): Promise<ServedAsset | null> {
    if (!requestPath.startsWith(ASSET_PREFIX)) return null
    const relative = requestPath.slice(ASSET_PREFIX.length)

    if (relative === RUNTIME_BUNDLE) {
      return { body: await this.getRuntimeBundle(), contentType: this.getMimeType(RUNTIME_BUNDLE) }
    }

    if (relative.startsWith('css/')) {
      const css = this.getStyle(relative.slice('css/'.length))
      if (css !== undefined) {
        return { body: css, contentType: this.getMimeType(relative) }
      }
    }

    return this.readStatic(relative)
  }

  async readStatic(relative: string): Promise<ServedAsset | null> {
    if (!this.options.publicDir) return null

    const root = path.resolve(this.options.publicDir)
    let decoded: string
    try {
      decoded = decodeURIComponent(relative)
    } catch {
      return null
    }
    const file = path.resolve(root, decoded)
    if (!file.startsWith(root + path.sep)) {
      this.logger.warn('Rejected asset path outside the public directory', { path: relative })
      return null
    }

    try {
      const body = await fs.readFile(file)
      return { body, contentType: this.getMimeType(file) }
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        return null
      }
      throw error
    }
  }

  /**
   * Bundle the client runtime and write it to `outFile`
   */
  async writeRuntimeBundle(outFile: string): Promise<number> {
    const bundle = await this.bundleRuntime()
    await fs.mkdir(path.dirname(outFile), { recursive: true })
    await fs.writeFile(outFile, bundle, 'utf8')
    return Buffer.byteLength(bundle)
  }

  getMimeType(filename: string): string {
    const ext = path.extname(filename).toLowerCase()
    const mimeTypes: Record<string, string> = {
      '.js': 'text/javascript; charset=utf-8',
      '.mjs': 'text/javascript; charset=utf-8',
      '.css': 'text/css; charset=utf-8',
      '.html': 'text/html; charset=utf-8',
      '.json': 'application/json',
      '.svg': 'image/svg+xml',
      '.ico': 'image/x-icon',
      '.jpg': 'image/jpeg',
      '.jpeg': 'image/jpeg',
      '.png': 'image/png',
      '.gif': 'image/gif',
      '.webp': 'image/webp',
      '.woff': 'font/woff',
      '.woff2': 'font/woff2',
      '.txt': 'text/plain; charset=utf-8',
    }

    return mimeTypes[ext] || 'application/octet-stream'
  }

  private async loadRuntime(): Promise<string> {
    const prebuilt = this.options.prebuiltRuntime
    if (prebuilt && !this.options.dev) {
      try {
        const bundle = await fs.readFile(prebuilt, 'utf8')
        this.logger.info(`Serving prebuilt client runtime from ${prebuilt}`)
        return bundle
      } catch (error) {
        this.logger.warn('Prebuilt client runtime is unreadable; bundling on demand', {
          path: prebuilt,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
    return this.bundleRuntime()
  }

  private async bundleRuntime(): Promise<string> {
    const started = Date.now()
    const dev = this.options.dev ?? false
    const result = await build({
      stdin: {
        contents: createRuntimeEntry(this.options.clientModules ?? CLIENT_RUNTIME_MODULES, resolveHydratorPath()),
        resolveDir: here,
        sourcefile: 'hydrant-runtime.js',
        loader: 'js',
      },
      bundle: true,
      format: 'esm',
      platform: 'browser',
      target: 'es2022',
      conditions: [dev ? 'development' : 'production'],
      minify: !dev,
      write: false,
      logLevel: 'silent',
    })

    const output = result.outputFiles?.[0]
    if (!output) {
      throw new Error('esbuild produced no output for the client runtime')
    }
    this.logger.info(`Bundled client runtime (${Math.round(output.contents.length / 1024)} KiB) in ${Date.now() - started}ms`)
    return output.text
  }
}

/**
 * Entry module for the client runtime bundle: registers every runtime module
 * under the specifier generated client code imports it by, and exports the
 * hydrator the bootstrap calls.
 */
export function createRuntimeEntry(modules: readonly string[], hydratorPath: string): string {
  const imports = modules.map((specifier, index) => `import * as m${index} from ${JSON.stringify(specifier)};`)
  const registry = modules.map((specifier, index) => `    ${JSON.stringify(specifier)}: m${index},`)

  return [
    ...imports,
    'import { hydrate } from "svelte";',
    `import { createHydrator } from ${JSON.stringify(hydratorPath)};`,
    '',
    'export const hydrateComponent = createHydrator({',
    '  modules: {',
    ...registry,
    '  },',
    '  hydrate,',
    '  host: document,',
    '  globals: globalThis,',
    '});',
    '',
  ].join('\n')
}

function resolveHydratorPath(): string {
  const coreEntry = createRequire(import.meta.url).resolve('@hydrant/runtime-core')
  return path.join(path.dirname(coreEntry), 'hydration', 'client-hydrator.ts')
}
