/**
 * Config File Watcher
 *
 * Watches the project configuration in development and hands the reloaded
 * configuration to the engine, which rebuilds its route table. Templates
 * and controllers need no watching: both are re-read on every request.
 */

import { watch, type FSWatcher } from 'chokidar'
import { loadConfig, type LoadedConfig } from '../config/config-loader.js'

export interface ConfigWatcherOptions {
  configPath: string
  projectDir: string
  onReload: (loaded: LoadedConfig) => Promise<void> | void
  onError?: (error: Error) => void
  env?: NodeJS.ProcessEnv
}

export class ConfigWatcher {
  private watcher: FSWatcher | null = null
  private isReloading = false

  constructor(private options: ConfigWatcherOptions) {}

  /**
   * Start watching the configuration file for changes
   */
  start(): void {
    console.log(`👀 Watching for configuration changes: ${this.options.configPath}`)

    this.watcher = watch(this.options.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 100,
      },
    })

    this.watcher.on('change', (changed) => {
      console.log(`\n📝 Configuration changed: ${changed}`)
      void this.reload()
    })

    this.watcher.on('error', (error) => {
      console.error('❌ Configuration watcher error:', error)
      this.options.onError?.(error)
    })
  }

  /**
   * Reload the configuration now. Returns false when skipped or failed.
   */
  async reload(): Promise<boolean> {
    if (this.isReloading) {
      console.log('⏳ Reload already in progress, skipping...')
      return false
    }

    this.isReloading = true
    console.log('🔄 Reloading...')

    try {
      const startTime = Date.now()
      const loaded = await loadConfig(this.options.projectDir, this.options.env)
      await this.options.onReload(loaded)

      console.log(`✅ Reload complete in ${Date.now() - startTime}ms\n`)
      return true
    } catch (error) {
      console.error('❌ Failed to reload configuration:', error instanceof Error ? error.message : error)
      this.options.onError?.(error instanceof Error ? error : new Error(String(error)))
      return false
    } finally {
      this.isReloading = false
    }
  }

  /**
   * Stop watching
   */
  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close()
      this.watcher = null
      console.log('👋 Stopped watching configuration')
    }
  }
}
