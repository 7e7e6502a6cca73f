import { describe, it, expect, vi } from 'vitest'
import { ComponentRuntimeError, ErrorSanitizer, type RenderRequest } from '@hydrant/runtime-core'
import { ServerManager, type ServerManagerDependencies } from './server-manager.js'
import { RouteTable } from '../routing/route-table.js'
import { ErrorHandler } from '../errors/error-handler.js'
import type { ControllerRequest } from '../controllers/controller-loader.js'
import type { ServedAsset } from '../assets/asset-manager.js'

function createManager(overrides: Partial<ServerManagerDependencies> = {}) {
  const load = vi.fn(async (_controller: string, request: ControllerRequest) => ({
    componentData: { id: request.params.id ?? null },
    documentMetadata: { title: 'Todos' },
  }))
  const renderDocument = vi.fn(async (request: RenderRequest) => `<html>${request.identity}</html>`)
  const resolve = vi.fn(async (requestPath: string): Promise<ServedAsset | null> =>
    requestPath === '/assets/runtime.js'
      ? { body: 'export const hydrateComponent = () => {}', contentType: 'text/javascript; charset=utf-8' }
      : null
  )

  const manager = new ServerManager({
    host: '127.0.0.1',
    port: 0,
    dev: false,
    state: { status: 'running', version: '0.1.0' },
    routes: RouteTable.fromConfig({ root: 'todos.index', routes: {}, resources: ['todos'] }),
    controllers: { load },
    renderer: { renderDocument },
    assets: { resolve },
    errorHandler: new ErrorHandler({ sanitizer: new ErrorSanitizer(false), logger: { debug() {}, info() {}, warn() {}, error() {} } }),
    ...overrides,
  })

  return { manager, app: manager.createApp(), load, renderDocument, resolve }
}

describe('ServerManager', () => {
  it('reports health from the engine state', async () => {
    const { app } = createManager()
    const res = await app.request('/health')
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body).toMatchObject({ healthy: true, status: 'running' })
  })

  it('reports 503 while the engine is not running', async () => {
    const { app } = createManager({ state: { status: 'stopping', version: '0.1.0' } })
    expect((await app.request('/health')).status).toBe(503)
  })

  it('renders a routed page through its controller', async () => {
    const { app, load, renderDocument } = createManager()

    const res = await app.request('/todos/7?filter=open')

    expect(res.status).toBe(200)
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=UTF-8')
    expect(await res.text()).toBe('<html>todos/show.svelte</html>')
    expect(load).toHaveBeenCalledWith('todos', {
      path: '/todos/7',
      params: { id: '7' },
      query: { filter: 'open' },
      action: 'show',
    })
    expect(renderDocument).toHaveBeenCalledWith({
      identity: 'todos/show.svelte',
      componentData: { id: '7' },
      documentMetadata: { title: 'Todos' },
    })
  })

  it('sets the request id and security headers', async () => {
    const { app } = createManager()
    const res = await app.request('/')

    expect(res.headers.get('X-Request-ID')).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('X-Frame-Options')).toBe('DENY')
  })

  it('lets the page run its bootstrap and define the component from source', async () => {
    const { app } = createManager()
    const res = await app.request('/')

    expect(res.headers.get('Content-Security-Policy')).toBe(
      "default-src 'self'; script-src 'self' 'unsafe-inline' 'unsafe-eval' https:; " +
        "style-src 'self' 'unsafe-inline'; img-src 'self' data: https:"
    )
  })

  it('answers unknown paths with an HTML 404 page', async () => {
    const { app, renderDocument } = createManager()
    const res = await app.request('/nowhere')

    expect(res.status).toBe(404)
    expect(await res.text()).toContain('<p class="message">Page &#x2F;nowhere not found</p>')
    expect(renderDocument).not.toHaveBeenCalled()
  })

  it('serves assets and 404s the ones it does not know', async () => {
    const { app } = createManager()

    const runtime = await app.request('/assets/runtime.js')
    expect(runtime.status).toBe(200)
    expect(runtime.headers.get('Content-Type')).toBe('text/javascript; charset=utf-8')
    expect(runtime.headers.get('Cache-Control')).toBe('public, max-age=3600')
    expect(await runtime.text()).toBe('export const hydrateComponent = () => {}')

    expect((await app.request('/assets/missing.css')).status).toBe(404)
  })

  it('turns render failures into a 500 page', async () => {
    const renderDocument = vi.fn(async () => {
      throw new ComponentRuntimeError('Rendering todos/index.svelte failed: boom', 'todos/index.svelte')
    })
    const { app } = createManager({ renderer: { renderDocument } })

    const res = await app.request('/')

    expect(res.status).toBe(500)
    expect(await res.text()).toContain('<p class="message">Internal server error</p>')
  })

  it('uses routes swapped in after a reload', async () => {
    const { manager } = createManager()
    manager.updateDependencies({ routes: RouteTable.fromConfig({ routes: { '/about': 'pages.about' }, resources: [] }) })
    const app = manager.createApp()

    expect((await app.request('/about')).status).toBe(200)
    expect((await app.request('/todos')).status).toBe(404)
  })
})
