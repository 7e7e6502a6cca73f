/**
 * Server Manager
 *
 * Hono application and HTTP server. `/health` reports liveness, `/assets/*`
 * serves the client runtime, extracted styles and static files, and every
 * other GET path goes through the route table to a controller and a page
 * render.
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import { serve, type ServerType } from '@hono/node-server'
import { ulid } from 'ulid'
import { NotFoundError, silentLogger, type Logger } from '@hydrant/runtime-core'
import type { RouteTable } from '../routing/route-table.js'
import type { ControllerLoader } from '../controllers/controller-loader.js'
import type { PageRenderer } from '../render/page-renderer.js'
import type { AssetManager } from '../assets/asset-manager.js'
import type { ErrorHandler } from '../errors/error-handler.js'
import type { EngineState, HealthStatus } from '../types/engine.js'

export interface ServerManagerDependencies {
  host: string
  port: number
  dev: boolean
  state: EngineState
  routes: RouteTable
  controllers: Pick<ControllerLoader, 'load'>
  renderer: Pick<PageRenderer, 'renderDocument'>
  assets: Pick<AssetManager, 'resolve'>
  errorHandler: ErrorHandler
  logger?: Logger
}

export class ServerManager {
  private server?: ServerType
  private deps: ServerManagerDependencies
  private logger: Logger

  constructor(deps: ServerManagerDependencies) {
    this.deps = deps
    this.logger = deps.logger ?? silentLogger
  }

  updateDependencies(updates: Partial<ServerManagerDependencies>): void {
    this.deps = { ...this.deps, ...updates }
    if (updates.logger) this.logger = updates.logger
  }

  /**
   * Build the Hono application (exposed for in-process requests)
   */
  createApp(): Hono {
    const app = new Hono()
    app.onError(this.deps.errorHandler.toHonoHandler())
    this.registerGlobalMiddleware(app)
    this.registerRoutes(app)
    return app
  }

  async start(): Promise<ServerType> {
    const app = this.createApp()
    const { host, port } = this.deps

    this.server = serve(
      {
        fetch: app.fetch,
        port,
        hostname: host,
      },
      (info) => {
        console.log(`✅ HTTP Server listening on http://${host}:${info.port}`)
      }
    )

    return this.server
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) return

    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => {
        if (err) reject(err)
        else resolve()
      })
    })
    this.server = undefined
  }

  getServer(): ServerType | undefined {
    return this.server
  }

  private registerGlobalMiddleware(app: Hono): void {
    app.use('*', async (c, next) => {
      const requestId = ulid()
      Reflect.set(c.req.raw, 'requestId', requestId)
      const started = Date.now()

      try {
        await next()
      } finally {
        this.applySecurityHeaders(c, requestId)
        this.logger.debug(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - started}ms`, { requestId })
      }
    })
  }

  private registerRoutes(app: Hono): void {
    app.get('/health', () => {
      const health = this.getHealthStatus()
      return Response.json(health, { status: health.healthy ? 200 : 503 })
    })

    app.get('/assets/*', async (c) => {
      const asset = await this.deps.assets.resolve(c.req.path)
      if (!asset) {
        throw new NotFoundError(`Asset ${c.req.path}`)
      }

      return new Response(asset.body, {
        status: 200,
        headers: {
          'Content-Type': asset.contentType,
          'Cache-Control': this.deps.dev ? 'no-cache' : 'public, max-age=3600',
        },
      })
    })

    app.get('*', (c) => this.renderPage(c))

    app.notFound((c) => {
      return this.deps.errorHandler.handle(new NotFoundError(`Page ${c.req.path}`), c.req.raw)
    })
  }

  private async renderPage(c: Context): Promise<Response> {
    const match = this.deps.routes.match(c.req.path)
    if (!match) {
      throw new NotFoundError(`Page ${c.req.path}`)
    }

    const { target, params } = match
    const data = await this.deps.controllers.load(target.controller, {
      path: c.req.path,
      params,
      query: c.req.query(),
      action: target.action,
    })

    const page = await this.deps.renderer.renderDocument({
      identity: target.template,
      componentData: data.componentData,
      documentMetadata: data.documentMetadata,
    })

    return c.html(page)
  }

  private getHealthStatus(): HealthStatus {
    const status = this.deps.state.status
    return {
      healthy: status === 'running',
      status,
      timestamp: new Date().toISOString(),
    }
  }

  private applySecurityHeaders(c: Context, requestId: string): void {
    const csp = [
      "default-src 'self'",
      // The hydrator defines the component with new Function
      "script-src 'self' 'unsafe-inline' 'unsafe-eval' https:",
      "style-src 'self' 'unsafe-inline'",
      "img-src 'self' data: https:",
    ].join('; ')

    c.header('X-Request-ID', requestId)
    c.header('Content-Security-Policy', csp)
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin')
  }
}
