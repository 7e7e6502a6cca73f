import { afterEach, describe, it, expect, vi } from 'vitest'
import { createHydrator, type HydrateOptions } from './client-hydrator.js'
import { buildHydrationPayload, type HydrationPayload } from './bootstrap-generator.js'
import { prepareArtifact } from '../artifacts/prepare-artifact.js'
import { partitionContext, DOC_ACCESSOR, PROPS_ACCESSOR } from '../context/context-surface.js'
import { MissingAccessorError } from '../errors/render-errors.js'
import { NotFoundError } from '../errors/base-error.js'
import type { ModuleRegistry } from '../types/render.js'

const FILENAME = Symbol('filename')

const APP_CODE = `import * as $ from 'svelte/internal/client';
App[$.FILENAME] = 'App.svelte';
export default function App() {
	return $.label + ': ' + getDoc().title;
}
`

interface FakeElement {
  id: string
}

function payloadFor(props: Record<string, unknown>, doc: Record<string, unknown>): HydrationPayload {
  const prepared = prepareArtifact(APP_CODE, 'client')
  return buildHydrationPayload(
    {
      identity: 'app',
      target: 'client',
      code: APP_CODE,
      style: '',
      fingerprint: 'f',
      prepared,
      warnings: [],
    },
    partitionContext(props, doc)
  )
}

function setup(elements: FakeElement[] = [{ id: 'app-root' }]) {
  const modules: ModuleRegistry = { 'svelte/internal/client': { FILENAME, label: 'title' } }
  const hydrate = vi.fn((_component: Function, _options: HydrateOptions<FakeElement>) => 'instance')
  const hydrateComponent = createHydrator<FakeElement>({
    modules,
    hydrate,
    host: { getElementById: (id) => elements.find(element => element.id === id) ?? null },
    globals: globalThis,
  })
  return { hydrate, hydrateComponent }
}

describe('createHydrator', () => {
  afterEach(() => {
    Reflect.deleteProperty(globalThis, PROPS_ACCESSOR)
    Reflect.deleteProperty(globalThis, DOC_ACCESSOR)
  })

  it('hydrates the component against the target element with the embedded props', () => {
    const { hydrate, hydrateComponent } = setup()

    const result = hydrateComponent(payloadFor({ count: 1 }, { title: 'Home' }))

    expect(result).toBe('instance')
    expect(hydrate).toHaveBeenCalledTimes(1)
    const [component, options] = hydrate.mock.calls[0]
    expect(options).toEqual({ target: { id: 'app-root' }, props: { count: 1 } })
    expect(Reflect.get(component, FILENAME)).toBe('App.svelte')
  })

  it('installs the context accessors before the component runs', () => {
    const { hydrate, hydrateComponent } = setup()

    hydrateComponent(payloadFor({ count: 1 }, { title: 'Home' }))
    const [component] = hydrate.mock.calls[0]

    expect(component()).toBe('title: Home')
    const getProps = Reflect.get(globalThis, PROPS_ACCESSOR)
    expect(typeof getProps === 'function' ? getProps() : undefined).toEqual({ count: 1 })
  })

  it('fails when the target element is missing', () => {
    const { hydrate, hydrateComponent } = setup([])

    expect(() => hydrateComponent(payloadFor({}, {}))).toThrow(NotFoundError)
    expect(() => hydrateComponent(payloadFor({}, {}))).toThrow('Hydration target #app-root not found')
    expect(hydrate).not.toHaveBeenCalled()
  })

  it('fails when the source does not produce a constructor', () => {
    const { hydrateComponent } = setup()
    const payload = { ...payloadFor({}, {}), source: 'return 42;' }

    expect(() => hydrateComponent(payload)).toThrow(MissingAccessorError)
  })
})
