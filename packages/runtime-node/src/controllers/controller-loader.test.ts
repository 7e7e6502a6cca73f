import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest'
import path from 'node:path'
import os from 'node:os'
import { promises as fs } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { ControllerError, ControllerLoader, type ControllerRequest } from './controller-loader.js'

const request: ControllerRequest = { path: '/todos/7', params: { id: '7' }, query: {}, action: 'show' }

describe('ControllerLoader', () => {
  let dir: string
  const modules = new Map<string, unknown>()
  const importModule = vi.fn(async (href: string) => modules.get(href.replace(/\?.*$/, '')))

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hydrant-controllers-'))
    for (const name of ['todos.js', 'broken.mjs', 'empty.js', 'odd.js']) {
      await fs.writeFile(path.join(dir, name), '// controller\n')
    }

    const href = (name: string) => pathToFileURL(path.join(dir, name)).href
    modules.set(href('todos.js'), {
      getContext: (req: ControllerRequest) => ({ id: req.params.id, todos: ['a'] }),
      getDoc: async () => ({ title: 'Todos' }),
    })
    modules.set(href('broken.mjs'), {
      getContext: () => {
        throw new Error('database down')
      },
    })
    modules.set(href('empty.js'), {})
    modules.set(href('odd.js'), { getContext: () => ['not', 'an', 'object'] })
  })

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('collects props and document metadata from the controller', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule })

    expect(await loader.load('todos', request)).toEqual({
      componentData: { id: '7', todos: ['a'] },
      documentMetadata: { title: 'Todos' },
    })
  })

  it('treats missing controllers and hooks as empty', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule })
    const empty = { componentData: {}, documentMetadata: {} }

    expect(await loader.load('missing', request)).toEqual(empty)
    expect(await loader.load('empty', request)).toEqual(empty)
  })

  it('wraps a throwing hook in a ControllerError', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule })

    const error = await loader.load('broken', request).catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(ControllerError)
    if (error instanceof ControllerError) {
      expect(error.message).toBe('Controller broken failed in getContext()')
      expect(error.cause).toEqual(new Error('database down'))
    }
  })

  it('rejects a hook that returns something other than an object', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule })
    await expect(loader.load('odd', request)).rejects.toBeInstanceOf(ControllerError)
  })

  it('ignores controller names that could leave the directory', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule })
    importModule.mockClear()

    expect(await loader.load('../todos', request)).toEqual({ componentData: {}, documentMetadata: {} })
    expect(importModule).not.toHaveBeenCalled()
  })

  it('busts the module cache in development', async () => {
    const loader = new ControllerLoader({ controllersDir: dir, importModule, dev: true })
    importModule.mockClear()

    await loader.load('todos', request)
    expect(importModule.mock.calls[0]?.[0]).toMatch(/todos\.js\?v=[\d.]+$/)
  })
})
