/**
 * Hydration Bootstrap Generator
 *
 * Builds the trailing `<script type="module">` of a page. The script imports
 * the client runtime bundle and hands it the client artifact's source, the
 * serialized component data and document metadata, and the artifact's
 * identity marker. Every embedded string is a template literal escaped with
 * scriptEmbedEscape.
 */

import { scriptEmbedEscape } from '../security/html-escape.js'
import type { PartitionedContext } from '../context/context-surface.js'
import type { CompiledArtifact, IdentityMarker } from '../types/render.js'

export const DEFAULT_RUNTIME_URL = '/assets/runtime.js'
export const DEFAULT_TARGET_ID = 'app-root'
export const HYDRATE_ENTRY = 'hydrateComponent'

/**
 * What the bootstrap passes to the client runtime's hydrate entry point
 */
export interface HydrationPayload {
  /** id of the element holding the server-rendered markup */
  target: string
  componentName: string
  /** Prepared client artifact body */
  source: string
  /** JSON text of component data */
  props: string
  /** JSON text of document metadata */
  doc: string
  marker: IdentityMarker | null
}

export interface BootstrapOptions {
  runtimeUrl?: string
  targetId?: string
}

export function buildHydrationPayload(
  clientArtifact: CompiledArtifact,
  context: PartitionedContext,
  targetId = DEFAULT_TARGET_ID
): HydrationPayload {
  return {
    target: targetId,
    componentName: clientArtifact.prepared.componentName,
    source: clientArtifact.prepared.body,
    props: context.serializedProps,
    doc: context.serializedDoc,
    marker: clientArtifact.prepared.marker,
  }
}

/**
 * Render the bootstrap `<script>` element for a client artifact
 */
export function buildHydrationScript(
  clientArtifact: CompiledArtifact,
  context: PartitionedContext,
  options: BootstrapOptions = {}
): string {
  if (clientArtifact.target !== 'client') {
    throw new Error(`Hydration needs a client artifact, got a ${clientArtifact.target} artifact`)
  }

  const payload = buildHydrationPayload(clientArtifact, context, options.targetId)
  const runtimeUrl = JSON.stringify(options.runtimeUrl ?? DEFAULT_RUNTIME_URL).replace(/<\//g, '<\\/')

  return [
    '<script type="module">',
    `import { ${HYDRATE_ENTRY} } from ${runtimeUrl};`,
    `${HYDRATE_ENTRY}(${renderPayload(payload)});`,
    '</script>',
  ].join('\n')
}

/**
 * Payload as a JavaScript object literal
 */
export function renderPayload(payload: HydrationPayload): string {
  const marker = payload.marker
    ? `{ binding: ${literal(payload.marker.binding)}, module: ${literal(payload.marker.module)}, ` +
      `property: ${literal(payload.marker.property)}, value: ${literal(payload.marker.value)} }`
    : 'null'

  return [
    '{',
    `  target: ${literal(payload.target)},`,
    `  componentName: ${literal(payload.componentName)},`,
    `  source: ${literal(payload.source)},`,
    `  props: ${literal(payload.props)},`,
    `  doc: ${literal(payload.doc)},`,
    `  marker: ${marker}`,
    '}',
  ].join('\n')
}

function literal(text: string): string {
  return `\`${scriptEmbedEscape(text)}\``
}
