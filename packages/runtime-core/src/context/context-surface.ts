/**
 * Context Surface
 *
 * The two accessors a component reads its inputs through. `getProps()`
 * yields component data (what the reactive props are seeded from) and
 * `getDoc()` yields document metadata. The two mappings are never merged.
 *
 * The server builds its surface from controller output; the browser rebuilds
 * an identical one from the serialized text the hydration bootstrap embeds.
 */

import { ContextSerializationError } from '../errors/render-errors.js'
import type { ComponentData, JsonValue } from '../types/render.js'
import { escapeJson } from '../security/html-escape.js'

export const PROPS_ACCESSOR = 'getProps'
export const DOC_ACCESSOR = 'getDoc'

export type JsonObject = { [key: string]: JsonValue }

export interface ContextSurface {
  getProps(): ComponentData
  getDoc(): JsonObject
}

export interface PartitionedContext {
  props: ComponentData
  doc: JsonObject
  /** JSON text of props, safe to place inside a script element */
  serializedProps: string
  serializedDoc: string
}

type ContextSource = 'componentData' | 'documentMetadata'

/**
 * Validate controller output and split it into the two context mappings.
 *
 * Only plain objects, arrays, strings, finite numbers, booleans and null are
 * accepted. Anything else raises ContextSerializationError naming the path.
 * Absent inputs become empty mappings.
 */
export function partitionContext(
  componentData: Record<string, unknown> | undefined,
  documentMetadata: Record<string, unknown> | undefined
): PartitionedContext {
  const props = toJsonObject(componentData ?? {}, 'componentData')
  const doc = toJsonObject(documentMetadata ?? {}, 'documentMetadata')

  return {
    props,
    doc,
    serializedProps: escapeJson(props),
    serializedDoc: escapeJson(doc),
  }
}

/**
 * Copy a value into a JSON object, rejecting anything JSON cannot carry
 * without loss.
 */
export function toJsonObject(value: unknown, source: ContextSource): JsonObject {
  const converted = toJsonValue(value, source, '$', new Set())
  if (converted === null || typeof converted !== 'object' || Array.isArray(converted)) {
    throw new ContextSerializationError(source, '$', 'expected an object at the top level')
  }
  return converted
}

function toJsonValue(value: unknown, source: ContextSource, path: string, ancestors: Set<object>): JsonValue {
  if (value === null) return null

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value
    case 'number':
      if (!Number.isFinite(value)) {
        throw new ContextSerializationError(source, path, `non-finite number ${String(value)}`)
      }
      return value
    case 'undefined':
      throw new ContextSerializationError(source, path, 'undefined value')
    case 'bigint':
    case 'symbol':
    case 'function':
      throw new ContextSerializationError(source, path, `${typeof value} value`)
  }

  if (typeof value !== 'object' || value === null) {
    throw new ContextSerializationError(source, path, 'unsupported value')
  }

  if (ancestors.has(value)) {
    throw new ContextSerializationError(source, path, 'circular reference')
  }

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      const items: JsonValue[] = []
      for (let i = 0; i < value.length; i++) {
        items.push(toJsonValue(value[i], source, `${path}[${i}]`, ancestors))
      }
      return items
    }

    const proto = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) {
      const name = typeof proto?.constructor === 'function' ? proto.constructor.name : 'object'
      throw new ContextSerializationError(source, path, `instance of ${name || 'anonymous class'}`)
    }

    if (Object.getOwnPropertySymbols(value).length > 0) {
      throw new ContextSerializationError(source, path, 'symbol-keyed property')
    }

    const result: JsonObject = {}
    for (const [key, entry] of Object.entries(value)) {
      // Own data property, so a "__proto__" key stays a key
      Object.defineProperty(result, key, {
        value: toJsonValue(entry, source, `${path}.${key}`, ancestors),
        enumerable: true,
        writable: true,
        configurable: true,
      })
    }
    return result
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Server-side surface: values computed upfront by the controller. Every call
 * returns a fresh copy so a component mutating its input cannot affect a
 * later read.
 */
export class ServerContextSurface implements ContextSurface {
  constructor(
    private readonly props: ComponentData,
    private readonly doc: JsonObject
  ) {}

  static fromPartition(context: PartitionedContext): ServerContextSurface {
    return new ServerContextSurface(context.props, context.doc)
  }

  getProps(): ComponentData {
    return structuredClone(this.props)
  }

  getDoc(): JsonObject {
    return structuredClone(this.doc)
  }
}

/**
 * Client-side surface: values rebuilt from the JSON text embedded in the page
 */
export class EmbeddedContextSurface implements ContextSurface {
  private readonly props: ComponentData
  private readonly doc: JsonObject

  constructor(serializedProps: string, serializedDoc: string) {
    this.props = parseEmbedded(serializedProps, 'componentData')
    this.doc = parseEmbedded(serializedDoc, 'documentMetadata')
  }

  getProps(): ComponentData {
    return structuredClone(this.props)
  }

  getDoc(): JsonObject {
    return structuredClone(this.doc)
  }
}

function parseEmbedded(text: string, source: ContextSource): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new ContextSerializationError(
      source,
      '$',
      `embedded text is not valid JSON (${error instanceof Error ? error.message : String(error)})`
    )
  }
  return toJsonObject(parsed, source)
}

/**
 * Expose a surface's accessors as globals on `target`. Returns a function
 * that removes them again.
 */
export function installContextSurface(target: object, surface: ContextSurface): () => void {
  const accessors = {
    [PROPS_ACCESSOR]: () => surface.getProps(),
    [DOC_ACCESSOR]: () => surface.getDoc(),
  }

  for (const [name, accessor] of Object.entries(accessors)) {
    Object.defineProperty(target, name, {
      value: accessor,
      configurable: true,
      enumerable: false,
      writable: false,
    })
  }

  return () => {
    for (const name of Object.keys(accessors)) {
      Reflect.deleteProperty(target, name)
    }
  }
}
