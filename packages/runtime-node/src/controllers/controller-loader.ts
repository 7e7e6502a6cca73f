/**
 * Controller Loader
 *
 * Controllers are modules under `app/controllers/` named after the route's
 * controller. Each may export `getContext(request)` for the component's
 * props and `getDoc(request)` for document metadata, sync or async. A
 * missing module or function yields an empty mapping.
 */

import path from 'node:path'
import { promises as fs } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { AppError, silentLogger, type Logger } from '@hydrant/runtime-core'

export const CONTROLLER_EXTENSIONS = ['.js', '.mjs', '.ts'] as const

export interface ControllerRequest {
  path: string
  params: Record<string, string>
  query: Record<string, string>
  action: string
}

export interface ControllerData {
  componentData: Record<string, unknown>
  documentMetadata: Record<string, unknown>
}

export type ModuleImport = (href: string) => Promise<unknown>

export interface ControllerLoaderOptions {
  controllersDir: string
  /** Re-import on every change of the file's mtime */
  dev?: boolean
  importModule?: ModuleImport
  logger?: Logger
}

export class ControllerError extends AppError {
  constructor(controller: string, hook: string, options?: { cause?: unknown }) {
    super(`Controller ${controller} failed in ${hook}()`, 'CONTROLLER_ERROR', 500, true, { controller, hook }, options)
  }
}

export class ControllerLoader {
  private dir: string
  private dev: boolean
  private importModule: ModuleImport
  private logger: Logger

  constructor(options: ControllerLoaderOptions) {
    this.dir = path.resolve(options.controllersDir)
    this.dev = options.dev ?? false
    this.importModule = options.importModule ?? ((href) => import(href))
    this.logger = options.logger ?? silentLogger
  }

  async load(controller: string, request: ControllerRequest): Promise<ControllerData> {
    const module = await this.importController(controller)
    if (!module) {
      return { componentData: {}, documentMetadata: {} }
    }

    return {
      componentData: await this.callHook(module, controller, 'getContext', request),
      documentMetadata: await this.callHook(module, controller, 'getDoc', request),
    }
  }

  private async importController(controller: string): Promise<Record<string, unknown> | null> {
    const file = await this.findModule(controller)
    if (!file) {
      this.logger.debug(`No controller module for ${controller}`)
      return null
    }

    let href = pathToFileURL(file.path).href
    if (this.dev) {
      // Each edit loads a new module; the ESM loader keeps the old ones
      href += `?v=${file.mtimeMs}`
    }

    const module = await this.importModule(href)
    return typeof module === 'object' && module !== null ? Object.fromEntries(Object.entries(module)) : null
  }

  private async findModule(controller: string): Promise<{ path: string; mtimeMs: number } | null> {
    if (!/^[A-Za-z_][\w-]*$/.test(controller)) return null

    for (const extension of CONTROLLER_EXTENSIONS) {
      const candidate = path.join(this.dir, `${controller}${extension}`)
      try {
        const stat = await fs.stat(candidate)
        if (stat.isFile()) return { path: candidate, mtimeMs: stat.mtimeMs }
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error
      }
    }
    return null
  }

  private async callHook(
    module: Record<string, unknown>,
    controller: string,
    hook: 'getContext' | 'getDoc',
    request: ControllerRequest
  ): Promise<Record<string, unknown>> {
    const fn = module[hook]
    if (typeof fn !== 'function') return {}

    let value: unknown
    try {
      value = await fn(request)
    } catch (error) {
      throw new ControllerError(controller, hook, { cause: error })
    }

    if (value === undefined || value === null) return {}
    if (!isRecord(value)) {
      throw new ControllerError(controller, hook, {
        cause: new TypeError(`${hook}() must return an object, got ${Array.isArray(value) ? 'an array' : typeof value}`),
      })
    }
    return value
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
