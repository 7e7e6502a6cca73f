import { describe, it, expect } from 'vitest'
import type { CompileRequest, ComponentCompiler, ComponentSourceReader } from '@hydrant/runtime-core'
import { PageRenderer } from './page-renderer.js'
import { ArtifactCache } from '../artifacts/artifact-cache.js'
import { ExecutionSandbox } from '../sandbox/execution-sandbox.js'
import { SvelteCompiler } from '../compiler/svelte-compiler.js'

const COUNTER = `<script>
  let { count = 0 } = $props();
  const doc = getDoc();
</script>

<svelte:head>
  <meta name="generator" content="integration">
</svelte:head>

<h1>{doc.title}</h1>
<p>Count: {count}</p>

<style>
  p { color: red; }
</style>
`

class CountingCompiler implements ComponentCompiler {
  calls = 0
  private inner = new SvelteCompiler()

  compile(request: CompileRequest) {
    this.calls++
    return this.inner.compile(request)
  }
}

function setup() {
  const files = new Map([['counter.svelte', COUNTER]])
  const sources: ComponentSourceReader = {
    read: async (identity) => ({ identity, text: files.get(identity) ?? '' }),
  }
  const compiler = new CountingCompiler()
  const artifacts = new ArtifactCache({ compiler })
  const renderer = new PageRenderer({
    sources,
    artifacts,
    sandbox: new ExecutionSandbox(),
    appName: 'Integration',
  })
  return { files, compiler, artifacts, renderer }
}

const request = {
  identity: 'counter.svelte',
  componentData: { count: 0 },
  documentMetadata: {
    title: 'Home',
    head: { meta: [{ name: 'description', content: 'A "quoted" page' }] },
  },
}

describe('rendering a real Svelte component', () => {
  it('renders the component, its head and the bootstrap', async () => {
    const { renderer } = setup()

    const page = await renderer.renderDocument(request)

    expect(page.split('<title>').length - 1).toBe(1)
    expect(page).toContain('<title>Home</title>')
    expect(page).toContain('<meta name="description" content="A &quot;quoted&quot; page">')
    expect(page).toContain('name="generator"')
    expect(page).toContain('Count: 0')
    expect(page).toContain('<h1>Home</h1>')
    expect(page).toContain('  props: `{"count":0}`,')
    expect(page).toContain('import { hydrateComponent } from "/assets/runtime.js";')
    expect(page).toMatch(/color:\s*red/)
  })

  it('produces a client artifact the bootstrap can hydrate', async () => {
    const { renderer } = setup()

    const result = await renderer.render(request)

    expect(result.clientError).toBeUndefined()
    expect(result.hydrationScript).toContain('  componentName: `Counter`,')
  })

  it('compiles an unchanged source only once per target', async () => {
    const { renderer, compiler, artifacts } = setup()

    await renderer.render(request)
    await renderer.render({ ...request, componentData: { count: 5 } })

    expect(compiler.calls).toBe(2)
    expect(artifacts.stats()).toMatchObject({ hits: 2, misses: 2, entries: 2 })
  })

  it('recompiles after the source changes', async () => {
    const { renderer, compiler, files, artifacts } = setup()

    await renderer.render(request)
    const before = await artifacts.getOrCompile('counter.svelte', 'server', COUNTER)

    const edited = COUNTER.replace('Count:', 'Total:')
    files.set('counter.svelte', edited)
    const result = await renderer.render(request)
    const after = await artifacts.getOrCompile('counter.svelte', 'server', edited)

    expect(result.bodyHtml).toContain('Total: 0')
    expect(after.fingerprint).not.toBe(before.fingerprint)
    expect(compiler.calls).toBe(4)
  })

  it('reports a syntax error with its location', async () => {
    const { renderer, files } = setup()
    files.set('counter.svelte', '<p>{count</p>\n')

    const error = await renderer.render(request).catch((caught: unknown) => caught)

    expect(error).toMatchObject({ code: 'COMPILE_ERROR', target: 'server', identity: 'counter.svelte' })
  })
})
