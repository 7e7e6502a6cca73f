/**
 * Config Loader
 *
 * Finds the project's configuration file, parses it and applies environment
 * overrides. A project without a configuration file runs on defaults.
 */

import path from 'node:path'
import { promises as fs } from 'node:fs'
import {
  CONFIG_FILES,
  ConfigurationError,
  parseConfig,
  type ConfigFormat,
  type HydrantConfig,
} from '@hydrant/runtime-core'

export interface ProjectLayout {
  projectDir: string
  templatesDir: string
  controllersDir: string
  staticDir: string
  buildDir: string
}

export interface LoadedConfig {
  config: HydrantConfig
  layout: ProjectLayout
  /** null when running on defaults */
  configPath: string | null
}

export function resolveProjectLayout(projectDir: string): ProjectLayout {
  const root = path.resolve(projectDir)
  return {
    projectDir: root,
    templatesDir: path.join(root, 'app', 'templates'),
    controllersDir: path.join(root, 'app', 'controllers'),
    staticDir: path.join(root, 'app', 'static'),
    buildDir: path.join(root, 'dist'),
  }
}

export async function findConfigFile(projectDir: string): Promise<{ path: string; format: ConfigFormat } | null> {
  for (const candidate of CONFIG_FILES) {
    const file = path.join(projectDir, candidate.file)
    try {
      const stat = await fs.stat(file)
      if (stat.isFile()) return { path: file, format: candidate.format }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error
    }
  }
  return null
}

export async function loadConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
  const layout = resolveProjectLayout(projectDir)
  const found = await findConfigFile(layout.projectDir)

  const config = found
    ? parseConfig(await fs.readFile(found.path, 'utf8'), found.format, path.basename(found.path))
    : parseConfig('{}', 'json')

  return {
    config: applyEnvOverrides(config, env),
    layout,
    configPath: found?.path ?? null,
  }
}

/**
 * HYDRANT_PORT, HYDRANT_HOST and NODE_ENV=production win over the file
 */
export function applyEnvOverrides(config: HydrantConfig, env: NodeJS.ProcessEnv): HydrantConfig {
  const server = { ...config.server }

  if (env.HYDRANT_PORT !== undefined && env.HYDRANT_PORT !== '') {
    const port = Number(env.HYDRANT_PORT)
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigurationError(`HYDRANT_PORT must be a port number, got "${env.HYDRANT_PORT}"`)
    }
    server.port = port
  }

  if (env.HYDRANT_HOST) {
    server.host = env.HYDRANT_HOST
  }

  return {
    ...config,
    server,
    dev: env.NODE_ENV === 'production' ? false : config.dev,
  }
}
