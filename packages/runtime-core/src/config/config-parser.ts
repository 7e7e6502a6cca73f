/**
 * Config Parser
 *
 * Parsing and validation of the project configuration (YAML, TOML or JSON).
 * File lookup and environment overrides live in the platform runtime.
 */

import * as TOML from '@iarna/toml'
import { load as loadYaml } from 'js-yaml'
import { z } from 'zod'
import { ConfigurationError } from '../errors/base-error.js'
import { DEFAULT_RUNTIME_URL } from '../hydration/bootstrap-generator.js'

export type ConfigFormat = 'yaml' | 'toml' | 'json'

/** Looked up in this order */
export const CONFIG_FILES: ReadonlyArray<{ file: string; format: ConfigFormat }> = [
  { file: 'hydrant.yml', format: 'yaml' },
  { file: 'hydrant.yaml', format: 'yaml' },
  { file: 'hydrant.toml', format: 'toml' },
  { file: 'hydrant.json', format: 'json' },
]

const IDENTIFIER = /^[A-Za-z_][\w-]*$/
const HANDLER = /^[A-Za-z_][\w-]*\.[A-Za-z_][\w]*$/

const HandlerSchema = z.string().regex(HANDLER, 'expected "controller.action"')

export const RouteTargetSchema = z.object({
  controller: z.string().regex(IDENTIFIER, 'expected a controller name'),
  action: z.string().regex(IDENTIFIER, 'expected an action name'),
  template: z.string().min(1).optional(),
})

export const HydrantConfigSchema = z.object({
  name: z.string().min(1).default('Hydrant App'),
  root: HandlerSchema.optional(),
  routes: z.record(z.union([HandlerSchema, RouteTargetSchema])).default({}),
  resources: z.array(z.string().regex(IDENTIFIER, 'expected a resource name')).default([]),
  dev: z.boolean().default(true),
  server: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(3000),
    })
    .default({}),
  sandbox: z
    .object({
      timeoutMs: z.number().int().positive().default(1000),
    })
    .default({}),
  assets: z
    .object({
      runtimeUrl: z.string().min(1).default(DEFAULT_RUNTIME_URL),
    })
    .default({}),
  head: z
    .object({
      blockedScriptPatterns: z.array(z.string().min(1)).optional(),
    })
    .default({}),
})

export type HydrantConfig = z.infer<typeof HydrantConfigSchema>
export type RouteTargetConfig = z.infer<typeof RouteTargetSchema>

/**
 * Parse and validate configuration text. `source` names the file in errors.
 */
export function parseConfig(content: string, format: ConfigFormat, source = 'configuration'): HydrantConfig {
  let data: unknown
  try {
    data = parseContent(content, format)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not parse ${source}: ${reason}`, { source, format }, { cause: error })
  }

  // An empty YAML document parses to undefined
  const result = HydrantConfigSchema.safeParse(data ?? {})
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }))
    throw new ConfigurationError(
      `Invalid configuration in ${source}:\n${issues.map((issue) => `  ${issue.path}: ${issue.message}`).join('\n')}`,
      { source, issues }
    )
  }

  return result.data
}

function parseContent(content: string, format: ConfigFormat): unknown {
  switch (format) {
    case 'yaml':
      return loadYaml(content)
    case 'toml':
      return TOML.parse(content)
    case 'json':
      return JSON.parse(content)
  }
}
