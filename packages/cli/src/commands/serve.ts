/**
 * Serve Command
 *
 * Runs the Hydrant Engine in production mode: no watcher, generic error
 * pages, and the prebuilt client runtime when `hydrant build` wrote one.
 */

import { resolve } from 'node:path'
import { HydrantEngine } from '@hydrant/runtime-node'

export interface ServeOptions {
  dir?: string
  port?: number
  host?: string
}

export async function serveCommand(options: ServeOptions = {}): Promise<void> {
  const engine = new HydrantEngine({
    projectDir: resolve(process.cwd(), options.dir ?? '.'),
    port: options.port,
    host: options.host,
    dev: false,
    hotReload: false,
    logLevel: 'info',
  })

  try {
    await engine.start()
  } catch (error) {
    console.error('Failed to start engine:', error)
    process.exit(1)
  }
}
