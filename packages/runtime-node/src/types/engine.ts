/**
 * Engine Types
 */

import type { LogLevel } from '@hydrant/runtime-core'

export interface EngineConfig {
  /** Directory holding the configuration file and `app/` */
  projectDir: string
  /** Overrides the configured port */
  port?: number
  /** Overrides the configured host */
  host?: string
  /** Overrides the configured mode */
  dev?: boolean
  /** Watch the configuration file (development only, default: true) */
  hotReload?: boolean
  logLevel?: LogLevel
  /** Install SIGTERM/SIGINT handlers on start (default: true) */
  handleSignals?: boolean
  env?: NodeJS.ProcessEnv
}

export interface EngineState {
  status: 'starting' | 'running' | 'reloading' | 'stopping' | 'stopped'
  startedAt?: Date
  version: string
}

export interface HealthStatus {
  healthy: boolean
  status: EngineState['status']
  timestamp: string
}
