/**
 * HTML Escaping & Script Embedding
 *
 * Escaping for the two places generated or user-supplied text lands in a page:
 * head markup (`<title>`, `<meta>`, `<script src>`) and script literals inside
 * the hydration bootstrap.
 *
 * None of these functions are idempotent. Escape exactly once, at the point of
 * embedding.
 */

// HTML entity map for escaping
const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
  '/': '&#x2F;',
}

const HTML_ENTITIES_REGEX = /[&<>"'\/]/g

type Escapable = string | number | boolean | null | undefined

/**
 * Escape HTML entities for text content
 */
export function escapeHtml(unsafe: Escapable): string {
  if (unsafe === null || unsafe === undefined) {
    return ''
  }

  const str = String(unsafe)
  return str.replace(HTML_ENTITIES_REGEX, char => HTML_ENTITIES[char] || char)
}

/**
 * Escape HTML attribute value (and head text content)
 */
export function escapeHtmlAttr(unsafe: Escapable): string {
  if (unsafe === null || unsafe === undefined) {
    return ''
  }

  const str = String(unsafe)
  // Attributes need more aggressive escaping
  return str
    .replace(HTML_ENTITIES_REGEX, char => HTML_ENTITIES[char] || char)
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;')
}

/**
 * Attribute names cannot be quoted, so anything outside a conservative
 * character set is dropped rather than escaped.
 */
export function sanitizeAttrName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_:.\-]/g, '')
}

/**
 * Escape text for embedding inside a backtick-delimited template literal that
 * itself sits in an inline `<script>` element.
 *
 * The order is fixed: backslashes first, then backticks, then interpolation
 * openers (carriage returns are escaped too, since a literal normalizes them
 * to line feeds). Each later step inserts backslashes that an earlier backslash pass
 * would otherwise double. The markup steps (`</`, `<!--`, `<script`) run last
 * for the same reason; the backslashes they insert are identity escapes the
 * literal drops again.
 */
export function scriptEmbedEscape(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/`/g, '\\`')
    .replace(/\$\{/g, '\\${')
    .replace(/\r/g, '\\r')
    .replace(/<\//g, '<\\/')
    .replace(/<!--/g, '<\\!--')
    .replace(/<(script)/gi, '<\\$1')
}

/**
 * Serialize JSON for a `<script type="application/json">` block or an inline
 * expression. `<`, `>` and `&` are emitted as unicode escapes so the payload
 * cannot close the surrounding element.
 */
export function escapeJson(value: unknown): string {
  const json = JSON.stringify(value) ?? 'null'
  return json
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')
}

/**
 * Sanitize URL to prevent javascript: and data: URLs
 */
export function sanitizeUrl(url: string | undefined): string {
  if (!url) {
    return ''
  }

  const trimmed = url.trim().toLowerCase()

  // Block dangerous protocols
  const dangerous = [
    'javascript:',
    'data:',
    'vbscript:',
    'file:',
    'about:',
  ]

  for (const proto of dangerous) {
    if (trimmed.startsWith(proto)) {
      return ''
    }
  }

  return url
}

export const DEFAULT_BLOCKED_SCRIPT_PATTERNS: readonly string[] = [
  'eval(',
  'Function(',
  'setTimeout(',
  'setInterval(',
  'document.write(',
  'innerHTML',
  'outerHTML',
  'document.cookie',
  'localStorage',
  'sessionStorage',
]

/**
 * Sanitize inline script text supplied through document metadata.
 *
 * Blocked patterns are replaced with a marker comment, and sequences that
 * would end the enclosing `<script>` element or open an HTML comment are
 * broken up.
 */
export function sanitizeInlineScript(
  code: string,
  blockedPatterns: readonly string[] = DEFAULT_BLOCKED_SCRIPT_PATTERNS
): string {
  let sanitized = code

  for (const pattern of blockedPatterns) {
    if (!pattern) continue
    sanitized = sanitized.split(pattern).join(`/* BLOCKED: ${pattern.replace(/\*\//g, '')} */`)
  }

  return sanitized
    .replace(/<\/(script)/gi, '<\\/$1')
    .replace(/<!--/g, '<\\!--')
}

/**
 * Neutralize `</style` inside extracted component CSS before inlining it
 */
export function sanitizeStyleText(css: string): string {
  return css.replace(/<\/(style)/gi, '<\\/$1')
}

/**
 * SafeHtml wrapper class to mark strings as safe HTML (already escaped/sanitized)
 */
export class SafeHtml {
  constructor(public readonly html: string) {}

  toString(): string {
    return this.html
  }
}

/**
 * Create a SafeHtml instance (for marking pre-escaped HTML as safe)
 */
export function safe(html: string): SafeHtml {
  return new SafeHtml(html)
}

/**
 * Template literal tag for safe HTML
 * Usage: html`<div>${unsafeVariable}</div>`
 *
 * Values that are SafeHtml instances are not escaped, so fragments compose
 * without double-escaping.
 */
export function html(strings: TemplateStringsArray, ...values: Array<SafeHtml | Escapable>): SafeHtml {
  let result = strings[0] ?? ''

  for (let i = 0; i < values.length; i++) {
    const value = values[i]

    if (value instanceof SafeHtml) {
      result += value.html
    } else {
      result += escapeHtml(value)
    }

    result += strings[i + 1] ?? ''
  }

  return new SafeHtml(result)
}

/**
 * Create safe HTML attributes
 */
export function attr(name: string, value: Escapable): string {
  if (value === null || value === undefined || value === false) {
    return ''
  }

  const safeName = sanitizeAttrName(name)
  if (!safeName) {
    return ''
  }

  if (value === true) {
    return ` ${safeName}`
  }

  return ` ${safeName}="${escapeHtmlAttr(value)}"`
}
