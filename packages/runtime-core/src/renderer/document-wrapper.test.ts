import { describe, it, expect } from 'vitest'
import { DocumentWrapper } from './document-wrapper.js'

describe('DocumentWrapper', () => {
  describe('wrapInDocument', () => {
    it('places head, body and bootstrap in their slots', () => {
      const page = new DocumentWrapper().wrapInDocument({
        headHtml: '<title>Home</title>',
        bodyHtml: '<p>Count: 0</p>',
        hydrationScript: '<script type="module"></script>',
      })

      expect(page).toBe(`<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Home</title>
</head>
<body>
<div id="app-root"><p>Count: 0</p></div>
<script type="module"></script>
</body>
</html>
`)
    })

    it('links the extracted stylesheet and honors a custom target id', () => {
      const page = new DocumentWrapper({ targetId: 'root', lang: 'de' }).wrapInDocument({
        headHtml: '<title>T</title>',
        bodyHtml: '',
        stylesheetHref: '/assets/css/counter.abc.css',
        hydrationScript: '',
      })

      expect(page).toContain('<html lang="de">')
      expect(page).toContain('<title>T</title>\n<link rel="stylesheet" href="&#x2F;assets&#x2F;css&#x2F;counter.abc.css">\n</head>')
      expect(page).toContain('<div id="root"></div>')
    })
  })

  describe('renderErrorPage', () => {
    const wrapper = new DocumentWrapper()

    it('shows escaped diagnostics when the sanitizer kept them', () => {
      const page = wrapper.renderErrorPage(
        {
          error: 'ComponentRuntimeError',
          message: 'x <b>',
          statusCode: 500,
          code: 'RENDER_ERROR',
          stack: 'Error: x\n at <anon>',
        },
        'req-1'
      )

      expect(page).toContain('<title>500 - x &lt;b&gt;</title>')
      expect(page).toContain('<p class="message">x &lt;b&gt;</p>')
      expect(page).toContain('<p class="code">RENDER_ERROR</p>')
      expect(page).toContain('<pre class="stack">Error: x\n at &lt;anon&gt;</pre>')
      expect(page).toContain('<p class="request-id">Request ID: req-1</p>')
    })

    it('renders a generic page without diagnostics', () => {
      const page = wrapper.renderErrorPage({
        error: 'Server Error',
        message: 'Internal server error',
        statusCode: 500,
      })

      expect(page).toContain('<title>500 - Internal server error</title>')
      expect(page).toContain('<h2>Server Error</h2>')
      expect(page).not.toContain('<pre')
      expect(page).not.toContain('request-id')
    })
  })
})
