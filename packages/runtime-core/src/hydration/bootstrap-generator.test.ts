import { describe, it, expect } from 'vitest'
import * as vm from 'node:vm'
import { buildHydrationPayload, buildHydrationScript } from './bootstrap-generator.js'
import { partitionContext } from '../context/context-surface.js'
import { prepareArtifact } from '../artifacts/prepare-artifact.js'
import type { CompiledArtifact, CompileTarget, PreparedArtifact } from '../types/render.js'

const CLIENT_CODE = `import * as $ from 'svelte/internal/client';
Counter[$.FILENAME] = 'Counter.svelte';
var root = $.template(\`<p> </p>\`);
function Counter($$anchor, $$props) {
	var p = root();
	$.append($$anchor, p);
}
export default Counter;
`

function artifactOf(prepared: PreparedArtifact, target: CompileTarget = 'client'): CompiledArtifact {
  return {
    identity: 'counter/show',
    target,
    code: '',
    style: '',
    fingerprint: 'f00d',
    prepared,
    warnings: [],
  }
}

/**
 * Runs the bootstrap's call statement with a stub entry point and returns
 * what the stub received.
 */
function evaluateBootstrap(script: string): unknown {
  const lines = script.split('\n')
  expect(lines[0]).toBe('<script type="module">')
  expect(lines[lines.length - 1]).toBe('</script>')

  let received: unknown
  vm.runInNewContext(lines.slice(2, -1).join('\n'), {
    hydrateComponent: (payload: unknown) => {
      received = payload
    },
  })
  return received
}

describe('buildHydrationScript', () => {
  const artifact = artifactOf(prepareArtifact(CLIENT_CODE, 'client'))

  it('imports the entry point from the runtime bundle', () => {
    const script = buildHydrationScript(artifact, partitionContext({ count: 0 }, {}))
    expect(script.split('\n')[1]).toBe('import { hydrateComponent } from "/assets/runtime.js";')
  })

  it('uses a configured runtime URL', () => {
    const script = buildHydrationScript(artifact, partitionContext({}, {}), { runtimeUrl: '/static/rt.js' })
    expect(script.split('\n')[1]).toBe('import { hydrateComponent } from "/static/rt.js";')
  })

  it('embeds the serialized component data', () => {
    const script = buildHydrationScript(artifact, partitionContext({ count: 0 }, { title: 'Home' }))
    expect(script).toContain('  props: `{"count":0}`,')
    expect(script).toContain('  doc: `{"title":"Home"}`,')
  })

  it('passes the payload through unchanged', () => {
    const context = partitionContext({ count: 0 }, { title: 'Home' })
    const script = buildHydrationScript(artifact, context)

    expect(evaluateBootstrap(script)).toEqual(buildHydrationPayload(artifact, context))
  })

  it('carries the identity marker', () => {
    const script = buildHydrationScript(artifact, partitionContext({}, {}))
    expect(evaluateBootstrap(script)).toMatchObject({
      componentName: 'Counter',
      target: 'app-root',
      marker: {
        binding: 'Counter',
        module: 'svelte/internal/client',
        property: 'FILENAME',
        value: 'Counter.svelte',
      },
    })
  })

  it('keeps source with backticks, backslashes and markup intact', () => {
    const body = 'const s = `</script><!-- ${name} \\` \\\\`;\nreturn App;'
    const hostile = artifactOf({
      body,
      componentName: 'App',
      marker: null,
      imports: [],
      namespaceMembers: {},
    })
    const script = buildHydrationScript(hostile, partitionContext({ note: '</script>' }, {}), {
      targetId: 'root',
    })

    expect(script.indexOf('</script>')).toBe(script.length - '</script>'.length)
    expect(script).not.toContain('<!--')
    expect(evaluateBootstrap(script)).toEqual({
      target: 'root',
      componentName: 'App',
      source: body,
      props: '{"note":"\\u003c/script\\u003e"}',
      doc: '{}',
      marker: null,
    })
  })

  it('refuses a server artifact', () => {
    const server = artifactOf(prepareArtifact(CLIENT_CODE, 'server'), 'server')
    expect(() => buildHydrationScript(server, partitionContext({}, {}))).toThrow(
      'Hydration needs a client artifact, got a server artifact'
    )
  })
})
