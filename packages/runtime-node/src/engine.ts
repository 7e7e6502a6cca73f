/**
 * Hydrant Engine
 *
 * Loads the project configuration, wires the rendering pipeline together and
 * runs the HTTP server. In development the configuration file is watched and
 * the route table rebuilt on change.
 */

import { EventEmitter } from 'node:events'
import path from 'node:path'
import { promises as fs, type Dirent } from 'node:fs'
import type { ServerType } from '@hono/node-server'
import type { Hono } from 'hono'
import {
  ErrorSanitizer,
  createConsoleLogger,
  type CompileTarget,
  type Logger,
} from '@hydrant/runtime-core'
import { loadConfig, type LoadedConfig } from './config/config-loader.js'
import { SvelteCompiler } from './compiler/svelte-compiler.js'
import { ArtifactCache, type ArtifactCacheStats } from './artifacts/artifact-cache.js'
import { ExecutionSandbox } from './sandbox/execution-sandbox.js'
import { FileSourceReader } from './render/file-source-reader.js'
import { PageRenderer } from './render/page-renderer.js'
import { AssetManager, RUNTIME_BUNDLE } from './assets/asset-manager.js'
import { ControllerLoader } from './controllers/controller-loader.js'
import { RouteTable } from './routing/route-table.js'
import { ErrorHandler } from './errors/error-handler.js'
import { ConfigWatcher } from './hot-reload/config-watcher.js'
import { ServerManager } from './engine/server-manager.js'
import type { EngineConfig, EngineState, HealthStatus } from './types/engine.js'

const ENGINE_VERSION = '0.1.0'
const TARGETS: readonly CompileTarget[] = ['server', 'client']

export interface BuildReport {
  runtimeFile: string
  runtimeBytes: number
  /** Template identities compiled for both targets */
  templates: string[]
}

export class HydrantEngine extends EventEmitter {
  private state: EngineState
  private config: EngineConfig
  private logger: Logger
  private loaded?: LoadedConfig
  private artifacts?: ArtifactCache
  private assets?: AssetManager
  private serverManager?: ServerManager
  private configWatcher?: ConfigWatcher
  private server?: ServerType
  private isShuttingDown = false
  private shutdownTimeout = 30000 // 30 seconds

  constructor(config: EngineConfig) {
    super()

    this.config = config
    this.logger = createConsoleLogger(config.logLevel ?? 'info')
    this.state = {
      status: 'starting',
      version: ENGINE_VERSION,
    }
  }

  /**
   * Load configuration and build every component, without listening
   */
  async initialize(): Promise<void> {
    const loaded = await loadConfig(this.config.projectDir, this.config.env)
    this.loaded = loaded
    console.log(`✅ Loaded configuration: ${loaded.configPath ?? 'defaults'} (${loaded.config.name})`)

    const { config, layout } = loaded
    const dev = this.isDev()

    this.artifacts = new ArtifactCache({ compiler: new SvelteCompiler(), dev, logger: this.logger })
    this.assets = new AssetManager({
      publicDir: layout.staticDir,
      prebuiltRuntime: path.join(layout.buildDir, 'assets', RUNTIME_BUNDLE),
      dev,
      logger: this.logger,
    })

    const sandbox = new ExecutionSandbox({ timeout: config.sandbox.timeoutMs, logger: this.logger })
    const renderer = new PageRenderer({
      sources: new FileSourceReader(layout.templatesDir),
      artifacts: this.artifacts,
      sandbox,
      appName: config.name,
      runtimeUrl: config.assets.runtimeUrl,
      blockedScriptPatterns: config.head.blockedScriptPatterns,
      styles: this.assets,
      logger: this.logger,
    })

    const errorHandler = new ErrorHandler({
      sanitizer: new ErrorSanitizer(dev),
      logger: this.logger,
    })

    this.serverManager = new ServerManager({
      host: this.config.host ?? config.server.host,
      port: this.config.port ?? config.server.port,
      dev,
      state: this.state,
      routes: RouteTable.fromConfig(config),
      controllers: new ControllerLoader({ controllersDir: layout.controllersDir, dev, logger: this.logger }),
      renderer,
      assets: this.assets,
      errorHandler,
      logger: this.logger,
    })
  }

  /**
   * Start the engine
   */
  async start(): Promise<void> {
    console.log('🚀 Starting Hydrant Engine...\n')

    try {
      this.state.status = 'starting'

      // 1. Configuration and rendering pipeline
      await this.initialize()

      // 2. HTTP server
      this.server = await this.requireServerManager().start()

      // 3. Hot reload (development only)
      const configPath = this.loaded?.configPath
      if (this.isDev() && this.config.hotReload !== false && configPath) {
        this.configWatcher = new ConfigWatcher({
          configPath,
          projectDir: this.config.projectDir,
          env: this.config.env,
          onReload: (loaded) => this.reload(loaded),
        })
        this.configWatcher.start()
      }

      this.state.status = 'running'
      this.state.startedAt = new Date()

      if (this.config.handleSignals !== false) {
        this.setupGracefulShutdown()
      }

      console.log('\n✅ Engine ready!')
      console.log(`🔧 Mode: ${this.isDev() ? 'development' : 'production'}`)
      console.log()
    } catch (error) {
      console.error('❌ Failed to start engine:', error)
      this.state.status = 'stopped'
      throw error
    }
  }

  /**
   * Stop the engine
   */
  async stop(): Promise<void> {
    // Prevent multiple shutdown attempts
    if (this.isShuttingDown) {
      return
    }
    this.isShuttingDown = true

    console.log('👋 Stopping Hydrant Engine...')

    this.state.status = 'stopping'

    if (this.configWatcher) {
      await this.configWatcher.stop()
    }

    if (this.serverManager) {
      await this.serverManager.stop()
    }

    this.server = undefined
    this.state.status = 'stopped'
    console.log('✅ Engine stopped')
  }

  /**
   * Apply a reloaded configuration. Only the route table follows the file;
   * everything else keeps its startup value until restart.
   */
  async reload(loaded?: LoadedConfig): Promise<void> {
    console.log('🔄 Reloading configuration...')

    const previous = this.state.status
    this.state.status = 'reloading'

    try {
      const next = loaded ?? (await loadConfig(this.config.projectDir, this.config.env))
      const routes = RouteTable.fromConfig(next.config)

      this.loaded = next
      this.requireServerManager().updateDependencies({ routes })

      this.emit('config:reload', {
        routes: routes.list(),
        timestamp: new Date(),
      })

      console.log(`✅ Reload complete (${routes.list().length} routes)`)
    } finally {
      this.state.status = previous
    }
  }

  /**
   * Write the client runtime bundle and compile every template for both
   * targets. The first compile error fails the build.
   */
  async build(): Promise<BuildReport> {
    if (!this.loaded || !this.artifacts || !this.assets) {
      await this.initialize()
    }
    const { loaded, artifacts, assets } = this
    if (!loaded || !artifacts || !assets) {
      throw new Error('Engine failed to initialize')
    }

    const { layout } = loaded
    const sources = new FileSourceReader(layout.templatesDir)
    const templates = await listTemplates(layout.templatesDir)

    for (const identity of templates) {
      const { text } = await sources.read(identity)
      for (const target of TARGETS) {
        await artifacts.getOrCompile(identity, target, text)
      }
      console.log(`  ✓ ${identity}`)
    }

    const runtimeFile = path.join(layout.buildDir, 'assets', RUNTIME_BUNDLE)
    const runtimeBytes = await assets.writeRuntimeBundle(runtimeFile)
    console.log(`📦 Wrote ${path.relative(layout.projectDir, runtimeFile)} (${runtimeBytes} bytes)`)

    return { runtimeFile, runtimeBytes, templates }
  }

  /**
   * Hono application over the current dependencies (in-process requests)
   */
  createApp(): Hono {
    return this.requireServerManager().createApp()
  }

  getState(): EngineState {
    return this.state
  }

  getVersion(): string {
    return ENGINE_VERSION
  }

  getHealth(): HealthStatus {
    return {
      healthy: this.state.status === 'running',
      status: this.state.status,
      timestamp: new Date().toISOString(),
    }
  }

  getArtifactStats(): ArtifactCacheStats | undefined {
    return this.artifacts?.stats()
  }

  getServer(): ServerType | undefined {
    return this.server
  }

  private isDev(): boolean {
    return this.config.dev ?? this.loaded?.config.dev ?? false
  }

  private requireServerManager(): ServerManager {
    if (!this.serverManager) {
      throw new Error('Engine is not initialized')
    }
    return this.serverManager
  }

  /**
   * Setup graceful shutdown handlers for SIGTERM and SIGINT
   */
  private setupGracefulShutdown(): void {
    const gracefulShutdown = async (signal: string) => {
      console.log(`\n⚠️  Received ${signal}, starting graceful shutdown...`)

      // Force exit if graceful shutdown takes too long
      const forceShutdownTimer = setTimeout(() => {
        console.error('❌ Graceful shutdown timed out, forcing exit')
        process.exit(1)
      }, this.shutdownTimeout)

      try {
        await this.stop()
        clearTimeout(forceShutdownTimer)
        process.exit(0)
      } catch (error) {
        console.error('❌ Error during graceful shutdown:', error)
        clearTimeout(forceShutdownTimer)
        process.exit(1)
      }
    }

    // Handle SIGTERM (e.g., from Docker, Kubernetes)
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'))

    // Handle SIGINT (e.g., Ctrl+C)
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'))
  }
}

/**
 * Template identities (paths relative to the templates directory, forward
 * slashes) of every `.svelte` file, sorted
 */
export async function listTemplates(templatesDir: string): Promise<string[]> {
  const found: string[] = []

  const walk = async (dir: string, prefix: string): Promise<void> => {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(dir, { withFileTypes: true })
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return
      throw error
    }

    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), relative)
      } else if (entry.isFile() && entry.name.endsWith('.svelte')) {
        found.push(relative)
      }
    }
  }

  await walk(templatesDir, '')
  return found.sort()
}
