/**
 * Execution Sandbox
 *
 * Runs a server artifact in a fresh vm context per render. The context gets
 * the module registry, the two context accessors and a scoped console;
 * browser globals are defined as undefined so components that probe for
 * them take their server path. Everything installed is torn down when the
 * render ends, whether it succeeded or not.
 *
 * Note: Node.js vm module is not a security boundary. Components are
 * application code; the sandbox isolates renders from each other and bounds
 * their running time, it does not contain hostile code.
 */

import * as vm from 'node:vm'
import { format, types } from 'node:util'
import {
  AppError,
  ComponentRuntimeError,
  MODULES_PARAM,
  MissingAccessorError,
  applyIdentityMarker,
  assertRegistryProvides,
  installContextSurface,
  silentLogger,
  type CompiledArtifact,
  type ContextSurface,
  type Logger,
  type ModuleRegistry,
  type ServerFragments,
} from '@hydrant/runtime-core'
import { RuntimeBridge, type RenderFunction } from './runtime-bridge.js'

export interface ExecutionSandboxOptions {
  bridge?: RuntimeBridge
  timeout?: number  // Per-script timeout in milliseconds (default: 1000)
  displayErrors?: boolean
  logger?: Logger
}

const HOST_BINDING = '__hydrant'
const BROWSER_GLOBALS = ['window', 'document', 'navigator', 'location'] as const

interface SessionHost {
  modules: ModuleRegistry
  render: RenderFunction
  props: Record<string, unknown>
  component: unknown
}

type ScopedConsole = Pick<Console, 'log' | 'info' | 'debug' | 'warn' | 'error'>

class SandboxSession {
  readonly consoleErrors: string[] = []
  readonly context: vm.Context
  private globals: Record<string, unknown>
  private uninstallSurface: () => void

  constructor(
    readonly identity: string,
    readonly host: SessionHost,
    surface: ContextSurface,
    logger: Logger
  ) {
    this.globals = {
      console: this.createConsole(logger),
      [HOST_BINDING]: host,
    }
    for (const name of BROWSER_GLOBALS) {
      this.globals[name] = undefined
    }
    this.uninstallSurface = installContextSurface(this.globals, surface)

    this.context = vm.createContext(this.globals, {
      name: `render:${identity}`,
      codeGeneration: { strings: false, wasm: false },
    })
  }

  dispose(): void {
    this.uninstallSurface()
    for (const key of Object.keys(this.globals)) {
      Reflect.deleteProperty(this.globals, key)
    }
    this.host.component = null
  }

  private createConsole(logger: Logger): ScopedConsole {
    const meta = { identity: this.identity }
    return {
      log: (...args: unknown[]) => logger.debug(`[SSR] ${format(...args)}`, meta),
      info: (...args: unknown[]) => logger.info(`[SSR] ${format(...args)}`, meta),
      debug: (...args: unknown[]) => logger.debug(`[SSR] ${format(...args)}`, meta),
      warn: (...args: unknown[]) => logger.warn(`[SSR] ${format(...args)}`, meta),
      error: (...args: unknown[]) => {
        const text = format(...args)
        this.consoleErrors.push(text)
        logger.warn(`[SSR] ${text}`, meta)
      },
    }
  }
}

export class ExecutionSandbox {
  private bridge: RuntimeBridge
  private timeout: number
  private displayErrors: boolean
  private logger: Logger

  constructor(options: ExecutionSandboxOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.bridge = options.bridge ?? new RuntimeBridge({ logger: this.logger })
    this.timeout = options.timeout || 1000
    this.displayErrors = options.displayErrors !== false
  }

  /**
   * Render a server artifact against the given context surface
   */
  async render(artifact: CompiledArtifact, surface: ContextSurface): Promise<ServerFragments> {
    if (artifact.target !== 'server') {
      throw new Error(`Expected a server artifact for ${artifact.identity}, got a ${artifact.target} artifact`)
    }

    const modules = await this.bridge.load()
    assertRegistryProvides(artifact.prepared, modules, 'server')
    const host: SessionHost = {
      modules,
      render: this.bridge.renderFunction(modules),
      props: surface.getProps(),
      component: null,
    }

    return this.withSession(artifact.identity, host, surface, (session) => this.execute(session, artifact))
  }

  private withSession<T>(
    identity: string,
    host: SessionHost,
    surface: ContextSurface,
    fn: (session: SandboxSession) => T
  ): T {
    const session = new SandboxSession(identity, host, surface, this.logger)
    try {
      return fn(session)
    } finally {
      session.dispose()
    }
  }

  private execute(session: SandboxSession, artifact: CompiledArtifact): ServerFragments {
    const { identity, prepared } = artifact

    try {
      // Step 1: evaluate the module body to obtain the constructor
      const component = this.runScript(
        session,
        `(function (${MODULES_PARAM}) {\n${prepared.body}\n})(${HOST_BINDING}.modules)`,
        `${identity}.server.js`
      )
      if (typeof component !== 'function') {
        throw new MissingAccessorError(
          'export default',
          `Server artifact for ${identity} did not produce a component constructor`
        )
      }
      applyIdentityMarker(component, prepared.marker, session.host.modules)
      session.host.component = component

      // Step 2: invoke it through the runtime's render entry point
      const output = this.runScript(
        session,
        `${HOST_BINDING}.render(${HOST_BINDING}.component, { props: ${HOST_BINDING}.props })`,
        `${identity}.render.js`
      )

      return {
        ...readRenderOutput(output, identity),
        styleCss: artifact.style,
        consoleErrors: [...session.consoleErrors],
      }
    } catch (error) {
      if (error instanceof AppError) throw error
      throw this.toRuntimeError(error, identity)
    }
  }

  private runScript(session: SandboxSession, source: string, filename: string): unknown {
    const script = new vm.Script(source, { filename })
    return script.runInContext(session.context, {
      timeout: this.timeout,
      displayErrors: this.displayErrors,
    })
  }

  private toRuntimeError(error: unknown, identity: string): ComponentRuntimeError {
    if (!types.isNativeError(error)) {
      return new ComponentRuntimeError(`Rendering ${identity} failed: ${String(error)}`, identity, {
        cause: error,
      })
    }

    const timedOut = 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT'
    const message = timedOut
      ? `Rendering ${identity} exceeded ${this.timeout}ms`
      : `Rendering ${identity} failed: ${error.message}`

    return new ComponentRuntimeError(message, identity, { cause: error, scriptStack: error.stack })
  }
}

function readRenderOutput(output: unknown, identity: string): { bodyHtml: string; headHtml: string } {
  if (typeof output !== 'object' || output === null || !('body' in output) || typeof output.body !== 'string') {
    throw new MissingAccessorError(
      'render().body',
      `The server runtime returned no markup for ${identity}`
    )
  }

  const head = 'head' in output && typeof output.head === 'string' ? output.head : ''
  return { bodyHtml: output.body, headHtml: head }
}
