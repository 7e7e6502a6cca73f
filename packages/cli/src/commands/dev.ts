/**
 * Dev Command
 *
 * Runs the Hydrant Engine in development mode with config hot reload.
 */

import { resolve } from 'node:path'
import { HydrantEngine } from '@hydrant/runtime-node'

export interface DevOptions {
  dir?: string
  port?: number
  host?: string
}

export async function devCommand(options: DevOptions = {}): Promise<void> {
  const engine = new HydrantEngine({
    projectDir: resolve(process.cwd(), options.dir ?? '.'),
    port: options.port,
    host: options.host,
    dev: true,
    hotReload: true,
    logLevel: 'debug',
  })

  try {
    await engine.start()
  } catch (error) {
    console.error('Failed to start engine:', error)
    process.exit(1)
  }
}
