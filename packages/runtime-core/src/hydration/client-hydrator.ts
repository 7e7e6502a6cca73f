/**
 * Client Hydrator
 *
 * Browser half of the bridge. The client runtime bundle calls
 * createHydrator once with the real client-side reactive runtime and exports
 * the result as `hydrateComponent`, which every page's bootstrap script
 * invokes.
 */

import { EmbeddedContextSurface, installContextSurface } from '../context/context-surface.js'
import { MODULES_PARAM, applyIdentityMarker } from '../artifacts/prepare-artifact.js'
import { MissingAccessorError } from '../errors/render-errors.js'
import { NotFoundError } from '../errors/base-error.js'
import type { ComponentData, ModuleRegistry } from '../types/render.js'
import type { HydrationPayload } from './bootstrap-generator.js'

/**
 * Module specifiers the client runtime bundle registers. Generated client
 * code may import any of these and nothing else.
 */
export const CLIENT_RUNTIME_MODULES: readonly string[] = [
  'svelte/internal/client',
  'svelte/internal/disclose-version',
  'svelte/internal/flags/legacy',
  'svelte',
  'svelte/store',
  'svelte/transition',
  'svelte/easing',
  'svelte/motion',
  'svelte/animate',
  'svelte/reactivity',
]

export interface HydrateOptions<TTarget> {
  target: TTarget
  props: ComponentData
}

export interface ClientRuntime<TTarget> {
  modules: ModuleRegistry
  /** The reactive runtime's hydrate entry point */
  hydrate: (component: Function, options: HydrateOptions<TTarget>) => unknown
  /** Usually `document` */
  host: { getElementById(id: string): TTarget | null }
  /** Where the context accessors are installed, usually `globalThis` */
  globals: object
}

export function createHydrator<TTarget>(runtime: ClientRuntime<TTarget>) {
  return function hydrateComponent(payload: HydrationPayload): unknown {
    const surface = new EmbeddedContextSurface(payload.props, payload.doc)
    installContextSurface(runtime.globals, surface)

    const factory = new Function(MODULES_PARAM, payload.source)
    const component: unknown = factory(runtime.modules)
    if (typeof component !== 'function') {
      throw new MissingAccessorError(
        payload.componentName,
        `Client artifact for ${payload.componentName} did not produce a component constructor`
      )
    }

    applyIdentityMarker(component, payload.marker, runtime.modules)

    const target = runtime.host.getElementById(payload.target)
    if (!target) {
      throw new NotFoundError(`Hydration target #${payload.target}`)
    }

    return runtime.hydrate(component, { target, props: surface.getProps() })
  }
}
