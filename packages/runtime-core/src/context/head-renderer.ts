/**
 * Head Renderer
 *
 * Turns normalized document metadata into `<head>` markup. Every value taken
 * from metadata is escaped here and nowhere earlier.
 */

import {
  DEFAULT_BLOCKED_SCRIPT_PATTERNS,
  attr,
  escapeHtmlAttr,
  sanitizeAttrName,
  sanitizeInlineScript,
  sanitizeUrl,
} from '../security/html-escape.js'
import type { DocumentMetadata, MetaTag, ScriptTag } from './document-metadata.js'

export interface HeadRenderOptions {
  /** Title used when metadata has none (the application name) */
  fallbackTitle: string
  blockedScriptPatterns?: readonly string[]
}

export function renderHead(metadata: DocumentMetadata, options: HeadRenderOptions): string {
  const lines: string[] = []
  const title = metadata.title ?? options.fallbackTitle

  lines.push(`<title>${escapeHtmlAttr(title)}</title>`)

  for (const tag of metadata.meta) {
    const meta = renderMetaTag(tag)
    if (meta) lines.push(meta)
  }

  const patterns = options.blockedScriptPatterns ?? DEFAULT_BLOCKED_SCRIPT_PATTERNS
  for (const script of metadata.scripts) {
    const rendered = renderScriptTag(script, patterns)
    if (rendered) lines.push(rendered)
  }

  return lines.join('\n')
}

export function renderMetaTag(tag: MetaTag): string | null {
  const attributes: string[] = []

  for (const [key, value] of Object.entries(tag)) {
    const name = sanitizeAttrName(key)
    if (!name) continue
    attributes.push(`${name}="${escapeHtmlAttr(value)}"`)
  }

  return attributes.length > 0 ? `<meta ${attributes.join(' ')}>` : null
}

export function renderScriptTag(script: ScriptTag, blockedPatterns: readonly string[]): string | null {
  const typeAttr = attr('type', script.type)

  if (script.src !== undefined) {
    const src = sanitizeUrl(script.src)
    // A rejected URL drops the tag entirely
    if (!src) return null

    return `<script${attr('src', src)}${typeAttr}${attr('async', script.async)}${attr('defer', script.defer)}></script>`
  }

  if (!script.content || !script.content.trim()) {
    return null
  }

  return `<script${typeAttr}>${sanitizeInlineScript(script.content, blockedPatterns)}</script>`
}
