/**
 * Build Command
 *
 * Compiles every template for both targets and writes the client runtime
 * bundle to `dist/assets/runtime.js`.
 */

import { resolve } from 'node:path'
import { ComponentCompileError, HydrantEngine } from '@hydrant/runtime-node'

export interface BuildOptions {
  dir?: string
}

export async function buildCommand(options: BuildOptions = {}): Promise<void> {
  const engine = new HydrantEngine({
    projectDir: resolve(process.cwd(), options.dir ?? '.'),
    dev: false,
    hotReload: false,
    handleSignals: false,
  })

  const startTime = Date.now()
  console.log('🔨 Building...')

  try {
    const report = await engine.build()
    console.log(`✅ Built ${report.templates.length} templates in ${Date.now() - startTime}ms`)
  } catch (error) {
    handleBuildError(error)
  }
}

function handleBuildError(error: unknown): never {
  if (error instanceof ComponentCompileError) {
    const location = error.location ? `:${error.location.line}:${error.location.column}` : ''
    console.error(`❌ ${error.identity}${location} (${error.target})`)
    console.error(`   ${error.message}`)
    if (error.frame) {
      console.error('')
      console.error(error.frame)
    }
    process.exit(1)
  }

  console.error('❌ Build failed')
  console.error(error instanceof Error ? `   ${error.message}` : `   ${String(error)}`)
  process.exit(1)
}
