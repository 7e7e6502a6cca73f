/**
 * Runtime Bridge
 *
 * Builds the module registry server artifacts run against. The compiler's
 * real server runtime is imported once and copied into a frozen layer, so
 * the few primitives that differ on the server (lifecycle hooks that never
 * fire) can be replaced without touching the shared module instances.
 */

import {
  MissingAccessorError,
  silentLogger,
  type Logger,
  type ModuleRegistry,
} from '@hydrant/runtime-core'

/**
 * Bumped whenever the overrides or the required primitives change
 */
export const EMULATION_CONTRACT_VERSION = 1

export const SERVER_RUNTIME_MODULE = 'svelte/internal/server'

/** Modules a server artifact may import. The first two must load. */
export const SERVER_RUNTIME_MODULES: readonly string[] = [
  SERVER_RUNTIME_MODULE,
  'svelte',
  'svelte/store',
  'svelte/transition',
  'svelte/easing',
  'svelte/motion',
  'svelte/animate',
  'svelte/reactivity',
  'svelte/internal/disclose-version',
]

const REQUIRED_MODULES = new Set([SERVER_RUNTIME_MODULE, 'svelte'])

/**
 * Server-runtime members the sandbox itself calls or that every compiled
 * component reads. Missing ones mean the installed compiler and runtime
 * disagree with this bridge.
 */
export const REQUIRED_PRIMITIVES: readonly string[] = ['render', 'escape']

export type ModuleImporter = (specifier: string) => Promise<unknown>

export interface RuntimeBridgeOptions {
  importer?: ModuleImporter
  logger?: Logger
}

export type RenderFunction = (component: unknown, options: { props: Record<string, unknown> }) => unknown

export class RuntimeBridge {
  private importer: ModuleImporter
  private logger: Logger
  private loading?: Promise<ModuleRegistry>

  constructor(options: RuntimeBridgeOptions = {}) {
    this.importer = options.importer ?? ((specifier) => import(specifier))
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Load (once) and return the frozen registry
   */
  load(): Promise<ModuleRegistry> {
    if (!this.loading) {
      this.loading = this.build().catch((error: unknown) => {
        this.loading = undefined
        throw error
      })
    }
    return this.loading
  }

  /**
   * The render entry point of a loaded registry
   */
  renderFunction(modules: ModuleRegistry): RenderFunction {
    const render = modules[SERVER_RUNTIME_MODULE]?.render
    if (!isRenderFunction(render)) {
      throw new MissingAccessorError(`${SERVER_RUNTIME_MODULE}#render`)
    }
    return render
  }

  private async build(): Promise<ModuleRegistry> {
    const registry: ModuleRegistry = {}

    for (const specifier of SERVER_RUNTIME_MODULES) {
      let namespace: unknown
      try {
        namespace = await this.importer(specifier)
      } catch (error) {
        if (REQUIRED_MODULES.has(specifier)) {
          throw new MissingAccessorError(
            specifier,
            `Server runtime module "${specifier}" could not be loaded: ${error instanceof Error ? error.message : String(error)}`
          )
        }
        this.logger.debug(`Optional runtime module ${specifier} is unavailable`)
        continue
      }
      registry[specifier] = copyNamespace(namespace)
    }

    applyServerOverrides(registry)
    verifyPrimitives(registry)

    for (const namespace of Object.values(registry)) {
      Object.freeze(namespace)
    }
    this.logger.debug('Server runtime bridge loaded', {
      contract: EMULATION_CONTRACT_VERSION,
      modules: Object.keys(registry).length,
    })
    return Object.freeze(registry)
  }
}

function copyNamespace(namespace: unknown): Record<string, unknown> {
  if (typeof namespace !== 'object' || namespace === null) return {}
  return Object.fromEntries(Object.entries(namespace))
}

/**
 * Lifecycle hooks that only make sense with a live DOM become no-ops
 */
function applyServerOverrides(registry: ModuleRegistry): void {
  const svelte = registry.svelte
  if (svelte) {
    svelte.onDestroy = () => {}
  }
}

function verifyPrimitives(registry: ModuleRegistry): void {
  const server = registry[SERVER_RUNTIME_MODULE]
  for (const name of REQUIRED_PRIMITIVES) {
    if (!server || typeof server[name] !== 'function') {
      throw new MissingAccessorError(`${SERVER_RUNTIME_MODULE}#${name}`, undefined, {
        contract: EMULATION_CONTRACT_VERSION,
      })
    }
  }
}

function isRenderFunction(value: unknown): value is RenderFunction {
  return typeof value === 'function'
}
