/**
 * Document Metadata
 *
 * Normalizes the `getDoc` mapping into the parts the head renderer knows:
 * `title`, `head.meta` and `head.script`. Each part is validated on its own,
 * so a malformed entry is dropped without discarding the rest. Unrecognized
 * keys are ignored.
 *
 * `head.script` knows three named entries: `analyticsID` (Google tag),
 * `hotjar` (numeric site id) and `custom` (inline lines). Any other name maps
 * to inline code or a script descriptor.
 */

import { z } from 'zod'

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()])

const MetaTagSchema = z.record(AttributeValueSchema)

const ScriptDescriptorSchema = z.object({
  src: z.string().optional(),
  async: z.boolean().optional(),
  defer: z.boolean().optional(),
  type: z.string().optional(),
  content: z.string().optional(),
})

// A bare string (or list of strings) is inline code
const ScriptEntrySchema = z.union([
  z.string(),
  z.array(z.string()),
  ScriptDescriptorSchema,
])

const AnalyticsIdSchema = z.union([z.string().trim().min(1), z.number()])

const HotjarIdSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\d+$/).transform(Number),
])

export type MetaTag = Record<string, string>

export interface ScriptTag {
  name: string
  src?: string
  async?: boolean
  defer?: boolean
  type?: string
  content?: string
}

export interface DocumentMetadata {
  title?: string
  meta: MetaTag[]
  scripts: ScriptTag[]
}

export function normalizeDocumentMetadata(doc: Record<string, unknown>): DocumentMetadata {
  const normalized: DocumentMetadata = { meta: [], scripts: [] }

  const title = z.union([z.string(), z.number()]).safeParse(doc.title)
  if (title.success) {
    normalized.title = String(title.data)
  }

  const head = z.record(z.unknown()).safeParse(doc.head)
  if (!head.success) {
    return normalized
  }

  const meta = z.array(z.unknown()).safeParse(head.data.meta)
  if (meta.success) {
    for (const entry of meta.data) {
      const tag = MetaTagSchema.safeParse(entry)
      if (!tag.success) continue

      const attributes: MetaTag = {}
      for (const [key, value] of Object.entries(tag.data)) {
        attributes[key] = String(value)
      }
      if (Object.keys(attributes).length > 0) {
        normalized.meta.push(attributes)
      }
    }
  }

  const scripts = z.record(z.unknown()).safeParse(head.data.script)
  if (scripts.success) {
    for (const [name, raw] of Object.entries(scripts.data)) {
      if (name === 'analyticsID') {
        const id = AnalyticsIdSchema.safeParse(raw)
        if (id.success) normalized.scripts.push(...googleTagScripts(String(id.data)))
        continue
      }

      if (name === 'hotjar') {
        const id = HotjarIdSchema.safeParse(raw)
        if (id.success) normalized.scripts.push(hotjarScript(id.data))
        continue
      }

      const entry = ScriptEntrySchema.safeParse(raw)
      if (!entry.success) continue

      if (typeof entry.data === 'string') {
        normalized.scripts.push({ name, content: entry.data })
      } else if (Array.isArray(entry.data)) {
        const content = entry.data
          .map(line => line.trim())
          .filter(Boolean)
          .join('\n')
        normalized.scripts.push({ name, content })
      } else {
        normalized.scripts.push({ name, ...entry.data })
      }
    }
  }

  return normalized
}

function googleTagScripts(id: string): ScriptTag[] {
  return [
    {
      name: 'analyticsID',
      src: `https://www.googletagmanager.com/gtag/js?id=${encodeURIComponent(id)}`,
      async: true,
    },
    {
      name: 'analyticsID',
      content: [
        'window.dataLayer = window.dataLayer || [];',
        'function gtag(){dataLayer.push(arguments);}',
        'gtag("js", new Date());',
        `gtag("config", ${JSON.stringify(id)});`,
      ].join('\n'),
    },
  ]
}

function hotjarScript(id: number): ScriptTag {
  return {
    name: 'hotjar',
    content: [
      '(function(h,o,t,j,a,r){',
      'h.hj=h.hj||function(){(h.hj.q=h.hj.q||[]).push(arguments)};',
      `h._hjSettings={hjid:${id},hjsv:6};`,
      'a=o.getElementsByTagName("head")[0];',
      'r=o.createElement("script");r.async=1;',
      'r.src=t+h._hjSettings.hjid+j+h._hjSettings.hjsv;',
      'a.appendChild(r);',
      '})(window,document,"https://static.hotjar.com/c/hotjar-",".js?sv=");',
    ].join('\n'),
  }
}
