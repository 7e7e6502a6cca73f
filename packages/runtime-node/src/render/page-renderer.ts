/**
 * Page Renderer
 *
 * Orchestrates one render. Both targets compile independently: a client
 * failure only costs the page its hydration, while a server failure fails
 * the request.
 */

import {
  CLIENT_RUNTIME_MODULES,
  DEFAULT_RUNTIME_URL,
  DocumentWrapper,
  MissingAccessorError,
  ServerContextSurface,
  buildHydrationScript,
  normalizeDocumentMetadata,
  partitionContext,
  renderHead,
  sanitizeStyleText,
  silentLogger,
  type ArtifactStore,
  type CompiledArtifact,
  type ComponentSourceReader,
  type Logger,
  type RenderRequest,
  type RenderResult,
} from '@hydrant/runtime-core'
import type { ExecutionSandbox } from '../sandbox/execution-sandbox.js'

/**
 * Publishes extracted component styles; returns the stylesheet URL
 */
export interface StyleRegistry {
  registerStyle(identity: string, css: string): string
}

export interface PageRendererOptions {
  sources: ComponentSourceReader
  artifacts: ArtifactStore
  sandbox: ExecutionSandbox
  /** Title used when the controller supplies none */
  appName: string
  runtimeUrl?: string
  targetId?: string
  lang?: string
  blockedScriptPatterns?: readonly string[]
  /** Module specifiers the client runtime bundle provides */
  clientModules?: readonly string[]
  styles?: StyleRegistry
  logger?: Logger
}

export class PageRenderer {
  private wrapper: DocumentWrapper
  private logger: Logger
  private clientModules: readonly string[]

  constructor(private options: PageRendererOptions) {
    this.wrapper = new DocumentWrapper({ targetId: options.targetId, lang: options.lang })
    this.logger = options.logger ?? silentLogger
    this.clientModules = options.clientModules ?? CLIENT_RUNTIME_MODULES
  }

  /**
   * Render the parts of a page
   */
  async render(request: RenderRequest): Promise<RenderResult> {
    const { identity } = request
    const context = partitionContext(request.componentData, request.documentMetadata)
    const source = await this.options.sources.read(identity)

    const [server, client] = await Promise.allSettled([
      this.options.artifacts.getOrCompile(identity, 'server', source.text),
      this.options.artifacts.getOrCompile(identity, 'client', source.text),
    ])

    if (server.status === 'rejected') {
      throw server.reason
    }

    const fragments = await this.options.sandbox.render(server.value, ServerContextSurface.fromPartition(context))
    if (fragments.consoleErrors.length > 0) {
      this.logger.warn(`${identity} logged errors while rendering`, { errors: fragments.consoleErrors })
    }

    const metadata = normalizeDocumentMetadata(context.doc)
    const documentHead = renderHead(metadata, {
      fallbackTitle: this.options.appName,
      blockedScriptPatterns: this.options.blockedScriptPatterns,
    })
    const headHtml = fragments.headHtml ? `${documentHead}\n${fragments.headHtml}` : documentHead

    const result: RenderResult = {
      bodyHtml: fragments.bodyHtml,
      styleCss: fragments.styleCss,
      headHtml,
      hydrationScript: '',
    }

    try {
      if (client.status === 'rejected') {
        throw client.reason
      }
      this.assertClientRuntimeProvides(client.value)
      result.hydrationScript = buildHydrationScript(client.value, context, {
        runtimeUrl: this.options.runtimeUrl ?? DEFAULT_RUNTIME_URL,
        targetId: this.options.targetId,
      })
    } catch (error) {
      const clientError = error instanceof Error ? error : new Error(String(error))
      this.logger.error(`Client artifact for ${identity} is unavailable; serving it without hydration`, {
        error: clientError.message,
      })
      result.clientError = clientError
    }

    return result
  }

  /**
   * Render a complete HTML document
   */
  async renderDocument(request: RenderRequest): Promise<string> {
    const result = await this.render(request)

    let headHtml = result.headHtml
    let stylesheetHref: string | undefined
    if (result.styleCss) {
      if (this.options.styles) {
        stylesheetHref = this.options.styles.registerStyle(request.identity, result.styleCss)
      } else {
        headHtml += `\n<style>${sanitizeStyleText(result.styleCss)}</style>`
      }
    }

    return this.wrapper.wrapInDocument({
      headHtml,
      bodyHtml: result.bodyHtml,
      stylesheetHref,
      hydrationScript: result.hydrationScript,
    })
  }

  private assertClientRuntimeProvides(artifact: CompiledArtifact): void {
    for (const specifier of artifact.prepared.imports) {
      if (!this.clientModules.includes(specifier)) {
        throw new MissingAccessorError(
          specifier,
          `Generated client code imports "${specifier}", which the client runtime bundle does not provide`,
          { target: 'client', component: artifact.prepared.componentName }
        )
      }
    }
  }
}
