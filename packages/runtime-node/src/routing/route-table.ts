/**
 * Route Table
 *
 * Maps request paths to a controller action and the component template that
 * renders it. Exact paths win over parameterized ones; among parameterized
 * routes the first declared wins.
 */

import { ConfigurationError, type HydrantConfig, type RouteTargetConfig } from '@hydrant/runtime-core'

export interface RouteTarget {
  controller: string
  action: string
  /** Template identity, relative to the templates directory */
  template: string
}

export interface RouteMatch {
  pattern: string
  target: RouteTarget
  params: Record<string, string>
}

interface CompiledRoute {
  pattern: string
  target: RouteTarget
  regex: RegExp | null
  paramNames: string[]
}

const DEFAULT_ROOT = 'home.index'

export class RouteTable {
  private routes: CompiledRoute[] = []

  static fromConfig(config: Pick<HydrantConfig, 'root' | 'routes' | 'resources'>): RouteTable {
    const table = new RouteTable()

    const declaresNothing = !config.root && Object.keys(config.routes).length === 0 && config.resources.length === 0
    const root = config.root ?? (declaresNothing ? DEFAULT_ROOT : undefined)
    if (root) {
      table.add('/', parseHandler(root))
    }

    for (const resource of config.resources) {
      table.add(`/${resource}`, targetFor(resource, 'index'))
      table.add(`/${resource}/new`, targetFor(resource, 'new'))
      table.add(`/${resource}/:id`, targetFor(resource, 'show'))
      table.add(`/${resource}/:id/edit`, targetFor(resource, 'edit'))
    }

    for (const [pattern, handler] of Object.entries(config.routes)) {
      table.add(pattern, typeof handler === 'string' ? parseHandler(handler) : fromTargetConfig(handler))
    }

    return table
  }

  /**
   * Add or replace a route
   */
  add(pattern: string, target: RouteTarget): void {
    const normalized = normalizePath(pattern)
    const paramNames: string[] = []
    let regex: RegExp | null = null

    if (normalized.includes(':')) {
      const source = normalized
        .split('/')
        .map((segment) => {
          if (!segment.startsWith(':')) return escapeRegex(segment)
          const name = segment.slice(1)
          if (!/^[A-Za-z_]\w*$/.test(name)) {
            throw new ConfigurationError(`Invalid route parameter "${segment}" in ${pattern}`)
          }
          paramNames.push(name)
          return '([^/]+)'
        })
        .join('/')
      regex = new RegExp(`^${source}$`)
    }

    const route: CompiledRoute = { pattern: normalized, target, regex, paramNames }
    const existing = this.routes.findIndex((candidate) => candidate.pattern === normalized)
    if (existing >= 0) {
      this.routes[existing] = route
    } else {
      this.routes.push(route)
    }
  }

  match(requestPath: string): RouteMatch | null {
    const normalized = normalizePath(requestPath)

    const exact = this.routes.find((route) => route.regex === null && route.pattern === normalized)
    if (exact) {
      return { pattern: exact.pattern, target: exact.target, params: {} }
    }

    for (const route of this.routes) {
      if (!route.regex) continue
      const found = route.regex.exec(normalized)
      if (!found) continue

      const params: Record<string, string> = {}
      try {
        route.paramNames.forEach((name, index) => {
          params[name] = decodeURIComponent(found[index + 1] ?? '')
        })
      } catch (error) {
        if (error instanceof URIError) return null
        throw error
      }
      return { pattern: route.pattern, target: route.target, params }
    }

    return null
  }

  list(): Array<{ pattern: string; target: RouteTarget }> {
    return this.routes.map(({ pattern, target }) => ({ pattern, target }))
  }
}

export function normalizePath(requestPath: string): string {
  const withSlash = requestPath.startsWith('/') ? requestPath : `/${requestPath}`
  const collapsed = withSlash.replace(/\/{2,}/g, '/')
  return collapsed.length > 1 && collapsed.endsWith('/') ? collapsed.slice(0, -1) : collapsed
}

function parseHandler(handler: string): RouteTarget {
  const [controller, action, ...rest] = handler.split('.')
  if (!controller || !action || rest.length > 0) {
    throw new ConfigurationError(`Route handler must look like "controller.action", got "${handler}"`)
  }
  return targetFor(controller, action)
}

function fromTargetConfig(config: RouteTargetConfig): RouteTarget {
  return {
    controller: config.controller,
    action: config.action,
    template: config.template ?? `${config.controller}/${config.action}.svelte`,
  }
}

function targetFor(controller: string, action: string): RouteTarget {
  return { controller, action, template: `${controller}/${action}.svelte` }
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
