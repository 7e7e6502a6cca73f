/**
 * Artifact Preparation
 *
 * The one place that knows the shape of the compiler's generated modules.
 * Generated code is an ES module; both the server sandbox and the browser
 * hydrator evaluate it as a plain function body instead, with the runtime
 * modules handed in through `__modules`.
 *
 * Preparation also lifts out the identity marker statement
 * (`Counter[$.FILENAME] = 'Counter.svelte'`). The marker becomes a declared
 * capability of the artifact and the host assigns it on the constructor
 * before invoking it (see applyIdentityMarker).
 */

import { MissingAccessorError } from '../errors/render-errors.js'
import type {
  CompileTarget,
  IdentityMarker,
  ModuleRegistry,
  PreparedArtifact,
} from '../types/render.js'

export const MODULES_PARAM = '__modules'

const IMPORT_FROM = /^[ \t]*import\s+([^'";]+?)\s+from\s+(['"])([^'"]+)\2;?[ \t]*$/gm
const IMPORT_SIDE_EFFECT = /^[ \t]*import\s+(['"])([^'"]+)\1;?[ \t]*$/gm
const EXPORT_DEFAULT_FUNCTION = /^([ \t]*)export\s+default\s+function\s+([A-Za-z_$][\w$]*)/m
const EXPORT_DEFAULT_BINDING = /^[ \t]*export\s+default\s+([A-Za-z_$][\w$]*)\s*;?[ \t]*$/m
const EXPORT_LIST = /^[ \t]*export\s*\{[^}]*\}\s*;?[ \t]*$/gm
const EXPORT_KEYWORD = /^([ \t]*)export\s+(?=(?:async\s+)?(?:function|const|let|var|class)\b)/gm
const MARKER_STATEMENT =
  /^[ \t]*([A-Za-z_$][\w$]*)\[([A-Za-z_$][\w$]*)\.([A-Za-z_$][\w$]*)\]\s*=\s*('(?:[^'\\\n]|\\.)*'|"(?:[^"\\\n]|\\.)*");?[ \t]*$/m

interface ImportBinding {
  specifier: string
  namespace?: string
  defaultName?: string
  named: Array<{ imported: string; local: string }>
}

/**
 * Rewrite generated module code into a function body returning the component
 */
export function prepareArtifact(code: string, target: CompileTarget): PreparedArtifact {
  const bindings: ImportBinding[] = []
  const imports: string[] = []

  let body = code.replace(IMPORT_FROM, (_match, clause: string, _quote: string, specifier: string) => {
    const binding = parseImportClause(clause, specifier, target)
    bindings.push(binding)
    if (!imports.includes(specifier)) imports.push(specifier)
    return renderBinding(binding)
  })

  body = body.replace(IMPORT_SIDE_EFFECT, (_match, _quote: string, specifier: string) => {
    if (!imports.includes(specifier)) imports.push(specifier)
    return ''
  })

  let componentName: string | undefined
  const fnExport = EXPORT_DEFAULT_FUNCTION.exec(body)
  if (fnExport) {
    componentName = fnExport[2]
    body = body.replace(EXPORT_DEFAULT_FUNCTION, '$1function $2')
  } else {
    const bindingExport = EXPORT_DEFAULT_BINDING.exec(body)
    if (bindingExport) {
      componentName = bindingExport[1]
      body = body.replace(EXPORT_DEFAULT_BINDING, '')
    }
  }

  if (!componentName) {
    throw new MissingAccessorError(
      'export default',
      `Generated ${target} code has no default export to use as the component`,
      { target }
    )
  }

  body = body.replace(EXPORT_LIST, '').replace(EXPORT_KEYWORD, '$1')

  const marker = extractMarker(body, componentName, bindings)
  if (marker) {
    body = body.replace(MARKER_STATEMENT, '')
  }

  return {
    body: `${body.trim()}\nreturn ${componentName};`,
    componentName,
    marker: marker?.marker ?? null,
    imports,
    namespaceMembers: collectMembers(body, bindings),
  }
}

function parseImportClause(clause: string, specifier: string, target: CompileTarget): ImportBinding {
  const binding: ImportBinding = { specifier, named: [] }
  let rest = clause.trim()

  const namespace = /^(?:([A-Za-z_$][\w$]*)\s*,\s*)?\*\s+as\s+([A-Za-z_$][\w$]*)$/.exec(rest)
  if (namespace) {
    if (namespace[1]) binding.defaultName = namespace[1]
    binding.namespace = namespace[2]
    return binding
  }

  const leadingDefault = /^([A-Za-z_$][\w$]*)\s*(?:,\s*|$)/.exec(rest)
  if (leadingDefault) {
    binding.defaultName = leadingDefault[1]
    rest = rest.slice(leadingDefault[0].length).trim()
  }

  if (rest) {
    const named = /^\{([\s\S]*)\}$/.exec(rest)
    if (!named) {
      throw new MissingAccessorError(
        specifier,
        `Unrecognized import clause "${clause.trim()}" in generated ${target} code`,
        { target }
      )
    }

    for (const part of named[1].split(',')) {
      const item = part.trim()
      if (!item) continue
      const [imported, local] = item.split(/\s+as\s+/)
      binding.named.push({ imported: imported.trim(), local: (local ?? imported).trim() })
    }
  }

  return binding
}

function renderBinding(binding: ImportBinding): string {
  const source = `${MODULES_PARAM}[${JSON.stringify(binding.specifier)}]`
  const statements: string[] = []

  if (binding.namespace) {
    statements.push(`const ${binding.namespace} = ${source};`)
  }
  if (binding.defaultName) {
    statements.push(`const ${binding.defaultName} = ${source}.default;`)
  }
  if (binding.named.length > 0) {
    const fields = binding.named.map(({ imported, local }) =>
      imported === local ? imported : `${imported}: ${local}`
    )
    statements.push(`const { ${fields.join(', ')} } = ${source};`)
  }

  return statements.join('\n')
}

function extractMarker(
  body: string,
  componentName: string,
  bindings: ImportBinding[]
): { marker: IdentityMarker } | null {
  const match = MARKER_STATEMENT.exec(body)
  if (!match) return null

  const [, target, namespace, property, literal] = match
  if (target !== componentName) return null

  const owner = bindings.find(binding => binding.namespace === namespace)
  if (!owner) return null

  return {
    marker: {
      binding: target,
      module: owner.specifier,
      property,
      value: decodeStringLiteral(literal),
    },
  }
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
}

function decodeStringLiteral(literal: string): string {
  return literal
    .slice(1, -1)
    .replace(/\\(u\{[0-9a-fA-F]+\}|u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[\s\S])/g, (_match, escape: string) => {
      if (escape.startsWith('u{')) return String.fromCodePoint(parseInt(escape.slice(2, -1), 16))
      if (escape.length > 1) return String.fromCharCode(parseInt(escape.slice(1), 16))
      return SIMPLE_ESCAPES[escape] ?? escape
    })
}

function collectMembers(body: string, bindings: ImportBinding[]): Record<string, string[]> {
  const members: Record<string, Set<string>> = {}
  const add = (specifier: string, member: string) => {
    if (!members[specifier]) members[specifier] = new Set()
    members[specifier].add(member)
  }

  for (const binding of bindings) {
    if (binding.defaultName) add(binding.specifier, 'default')
    for (const { imported } of binding.named) add(binding.specifier, imported)

    if (binding.namespace) {
      const local = binding.namespace.replace(/\$/g, '\\$')
      const access = new RegExp(`(?<![\\w$.])${local}\\.([A-Za-z_$][\\w$]*)`, 'g')
      for (const match of body.matchAll(access)) {
        add(binding.specifier, match[1])
      }
    }
  }

  return Object.fromEntries(
    Object.entries(members).map(([specifier, names]) => [specifier, [...names].sort()])
  )
}

/**
 * Check that every module and member a prepared artifact reads is present in
 * the registry. Throws MissingAccessorError naming the first gap.
 */
export function assertRegistryProvides(
  prepared: PreparedArtifact,
  modules: ModuleRegistry,
  target: CompileTarget
): void {
  for (const specifier of prepared.imports) {
    if (!Object.hasOwn(modules, specifier)) {
      throw new MissingAccessorError(
        specifier,
        `Generated ${target} code imports "${specifier}", which the ${target} runtime does not provide`,
        { target, component: prepared.componentName }
      )
    }
  }

  for (const [specifier, names] of Object.entries(prepared.namespaceMembers)) {
    const namespace = modules[specifier]
    for (const name of names) {
      if (!namespace || !(name in namespace)) {
        throw new MissingAccessorError(`${specifier}#${name}`, undefined, {
          target,
          component: prepared.componentName,
        })
      }
    }
  }
}

/**
 * Assign the artifact's identity marker on the component constructor. Must
 * run before the constructor is invoked.
 */
export function applyIdentityMarker(
  component: object,
  marker: IdentityMarker | null,
  modules: ModuleRegistry
): void {
  if (!marker) return

  const key = modules[marker.module]?.[marker.property]
  if (typeof key !== 'symbol' && typeof key !== 'string') {
    throw new MissingAccessorError(`${marker.module}#${marker.property}`, undefined, {
      marker: marker.binding,
    })
  }

  Reflect.set(component, key, marker.value)
}
