/**
 * Validate Command
 *
 * Checks the project configuration and its route table without starting
 * the engine.
 */

import { resolve } from 'node:path'
import {
  ConfigurationError,
  RouteTable,
  loadConfig,
  type LoadedConfig,
} from '@hydrant/runtime-node'

export interface ValidateOptions {
  dir?: string
}

export async function validateCommand(options: ValidateOptions = {}): Promise<void> {
  const projectDir = resolve(process.cwd(), options.dir ?? '.')
  const startTime = Date.now()

  try {
    const loaded = await loadConfig(projectDir)
    const routes = RouteTable.fromConfig(loaded.config)
    reportSuccess(loaded, routes, Date.now() - startTime)
  } catch (error) {
    handleValidationError(error, projectDir)
  }
}

function reportSuccess(loaded: LoadedConfig, routes: RouteTable, elapsedMs: number): void {
  console.log(`✅ Configuration valid: ${loaded.configPath ?? '(defaults, no configuration file)'}`)
  console.log(`   Project: ${loaded.config.name}`)
  console.log(`   Routes:`)
  for (const { pattern, target } of routes.list()) {
    console.log(`     ${pattern.padEnd(24)} ${target.controller}.${target.action} → ${target.template}`)
  }
  console.log(`   Checked in ${elapsedMs}ms`)
}

function handleValidationError(error: unknown, projectDir: string): never {
  if (error instanceof ConfigurationError) {
    console.error(`❌ Configuration invalid: ${projectDir}`)
    console.error('')
    console.error(error.message)
    process.exit(1)
  }

  console.error(`❌ Failed to validate configuration: ${projectDir}`)
  console.error(error instanceof Error ? `   ${error.message}` : `   ${String(error)}`)
  process.exit(1)
}
