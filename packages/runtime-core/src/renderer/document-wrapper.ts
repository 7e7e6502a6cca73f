/**
 * Document Wrapper
 *
 * HTML document structure around a rendered component, plus the error page.
 */

import { escapeHtml, escapeHtmlAttr, html, safe, SafeHtml } from '../security/html-escape.js'
import type { SanitizedError } from '../security/error-sanitizer.js'
import { DEFAULT_TARGET_ID } from '../hydration/bootstrap-generator.js'

export interface DocumentParts {
  /** Already-escaped head markup (title, meta, scripts, component head) */
  headHtml: string
  /** Server-rendered component markup */
  bodyHtml: string
  /** URL of the component's extracted stylesheet, if it has any style */
  stylesheetHref?: string
  /** Bootstrap `<script>`; empty when the page renders without hydration */
  hydrationScript: string
}

export interface DocumentWrapperOptions {
  targetId?: string
  lang?: string
}

export class DocumentWrapper {
  private targetId: string
  private lang: string

  constructor(options: DocumentWrapperOptions = {}) {
    this.targetId = options.targetId ?? DEFAULT_TARGET_ID
    this.lang = options.lang ?? 'en'
  }

  /**
   * Wrap rendered parts in a complete HTML document
   */
  wrapInDocument(parts: DocumentParts): string {
    const stylesheet = parts.stylesheetHref
      ? `\n<link rel="stylesheet" href="${escapeHtmlAttr(parts.stylesheetHref)}">`
      : ''

    return `<!DOCTYPE html>
<html lang="${escapeHtmlAttr(this.lang)}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
${parts.headHtml}${stylesheet}
</head>
<body>
<div id="${escapeHtmlAttr(this.targetId)}">${parts.bodyHtml}</div>
${parts.hydrationScript}
</body>
</html>
`
  }

  /**
   * Render an error page. Diagnostics (stack, compiler frame) appear only
   * when the sanitizer produced them, i.e. in development.
   */
  renderErrorPage(error: SanitizedError, requestId?: string): string {
    const title = `${error.statusCode} - ${error.message}`

    const diagnostics = [
      error.code ? html`<p class="code">${error.code}</p>` : safe(''),
      error.frame ? html`<pre class="frame">${error.frame}</pre>` : safe(''),
      error.stack ? html`<pre class="stack">${error.stack}</pre>` : safe(''),
    ]

    const body = html`<main class="error">
<h1>${error.statusCode}</h1>
<h2>${error.error}</h2>
<p class="message">${error.message}</p>
${joinHtml(diagnostics)}${requestId ? html`<p class="request-id">Request ID: ${requestId}</p>` : safe('')}
</main>`

    return `<!DOCTYPE html>
<html lang="${escapeHtmlAttr(this.lang)}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
</head>
<body>
${body.html}
</body>
</html>
`
  }
}

function joinHtml(fragments: SafeHtml[]): SafeHtml {
  return safe(fragments.map(fragment => fragment.html).filter(Boolean).join('\n'))
}
