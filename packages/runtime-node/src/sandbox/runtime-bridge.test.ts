import { describe, it, expect, vi } from 'vitest'
import { MissingAccessorError } from '@hydrant/runtime-core'
import { RuntimeBridge, SERVER_RUNTIME_MODULES } from './runtime-bridge.js'

function importerFor(modules: Record<string, object>) {
  return vi.fn(async (specifier: string) => {
    const namespace = modules[specifier]
    if (!namespace) throw new Error(`Cannot find module '${specifier}'`)
    return namespace
  })
}

const server = { render: () => ({ body: '' }), escape: String }

describe('RuntimeBridge', () => {
  it('loads each runtime module once', async () => {
    const importer = importerFor({ 'svelte/internal/server': server, svelte: {} })
    const bridge = new RuntimeBridge({ importer })

    const first = await bridge.load()
    const second = await bridge.load()

    expect(second).toBe(first)
    expect(importer).toHaveBeenCalledTimes(SERVER_RUNTIME_MODULES.length)
    expect(Object.keys(first)).toEqual(['svelte/internal/server', 'svelte'])
  })

  it('replaces destroy hooks with a no-op without touching the real module', async () => {
    const onDestroy = vi.fn()
    const svelte = { onDestroy, onMount: vi.fn() }
    const bridge = new RuntimeBridge({ importer: importerFor({ 'svelte/internal/server': server, svelte }) })

    const registry = await bridge.load()
    const hook = registry.svelte?.onDestroy
    expect(typeof hook).toBe('function')
    if (typeof hook === 'function') hook(() => {})

    expect(onDestroy).not.toHaveBeenCalled()
    expect(svelte.onDestroy).toBe(onDestroy)
    expect(registry.svelte?.onMount).toBe(svelte.onMount)
  })

  it('freezes the registry it hands out', async () => {
    const bridge = new RuntimeBridge({ importer: importerFor({ 'svelte/internal/server': server, svelte: {} }) })
    const registry = await bridge.load()

    expect(Object.isFrozen(registry)).toBe(true)
    expect(Object.isFrozen(registry['svelte/internal/server'])).toBe(true)
  })

  it('fails loudly when a required primitive is missing', async () => {
    const bridge = new RuntimeBridge({
      importer: importerFor({ 'svelte/internal/server': { render: server.render }, svelte: {} }),
    })

    await expect(bridge.load()).rejects.toThrow(
      'Generated code expects "svelte/internal/server#escape" but the runtime bridge does not provide it'
    )
  })

  it('fails when a required module cannot be imported, and retries on the next load', async () => {
    const modules: Record<string, object> = { svelte: {} }
    const bridge = new RuntimeBridge({ importer: importerFor(modules) })

    await expect(bridge.load()).rejects.toBeInstanceOf(MissingAccessorError)

    modules['svelte/internal/server'] = server
    await expect(bridge.load()).resolves.toHaveProperty(['svelte/internal/server'])
  })

  it('exposes the render entry point', async () => {
    const bridge = new RuntimeBridge({ importer: importerFor({ 'svelte/internal/server': server, svelte: {} }) })
    const registry = await bridge.load()

    expect(bridge.renderFunction(registry)).toBe(server.render)
    expect(() => bridge.renderFunction({})).toThrow(MissingAccessorError)
  })
})
