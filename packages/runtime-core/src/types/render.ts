/**
 * Render Types
 *
 * Shapes that cross the boundary between the compiler adapter, the artifact
 * cache, the sandbox and the hydration bootstrap.
 */

export type CompileTarget = 'server' | 'client'

export const COMPILE_TARGETS: readonly CompileTarget[] = ['server', 'client']

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/**
 * Data a controller hands to the component's reactive props
 */
export type ComponentData = Record<string, JsonValue>

export interface ComponentSource {
  /** Stable path or logical name */
  identity: string
  text: string
}

/**
 * Property the compiler expects on the generated constructor before it is
 * invoked, e.g. `Counter[$.FILENAME] = 'Counter.svelte'`.
 */
export interface IdentityMarker {
  /** Local name the generated code gives the constructor */
  binding: string
  /** Module specifier of the runtime namespace the property key is read from */
  module: string
  property: string
  value: string
}

/**
 * Runtime modules made available to a prepared artifact, keyed by the
 * specifier the generated code imports them under.
 */
export type ModuleRegistry = Record<string, Record<string, unknown>>

/**
 * Generated code after its module syntax has been rewritten into a function
 * body. The body expects `__modules` (a ModuleRegistry) in scope and ends
 * with `return <componentName>;`.
 */
export interface PreparedArtifact {
  body: string
  componentName: string
  marker: IdentityMarker | null
  /** Module specifiers the body reads from `__modules` */
  imports: string[]
  /** Members read from each imported namespace, keyed by specifier */
  namespaceMembers: Record<string, string[]>
}

export interface CompileWarning {
  code: string
  message: string
  line?: number
  column?: number
}

export interface CompileOutput {
  code: string
  style: string
  warnings: CompileWarning[]
}

export interface CompiledArtifact {
  identity: string
  target: CompileTarget
  code: string
  style: string
  fingerprint: string
  prepared: PreparedArtifact
  warnings: CompileWarning[]
}

export interface RenderRequest {
  identity: string
  componentData?: Record<string, unknown>
  documentMetadata?: Record<string, unknown>
}

export interface RenderResult {
  bodyHtml: string
  styleCss: string
  hydrationScript: string
  headHtml: string
  /** Set when the client artifact failed and the page renders without interactivity */
  clientError?: Error
}

export interface ServerFragments {
  bodyHtml: string
  headHtml: string
  styleCss: string
  /** `console.error` output the component produced while rendering */
  consoleErrors: string[]
}
