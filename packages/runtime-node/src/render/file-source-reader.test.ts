import { afterAll, beforeAll, describe, it, expect } from 'vitest'
import path from 'node:path'
import os from 'node:os'
import { promises as fs } from 'node:fs'
import { NotFoundError, ValidationError } from '@hydrant/runtime-core'
import { FileSourceReader } from './file-source-reader.js'

describe('FileSourceReader', () => {
  let templatesDir: string
  let reader: FileSourceReader

  beforeAll(async () => {
    templatesDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hydrant-sources-'))
    await fs.mkdir(path.join(templatesDir, 'home'))
    await fs.writeFile(path.join(templatesDir, 'home', 'index.svelte'), '<h1>Home</h1>\n')
    reader = new FileSourceReader(templatesDir)
  })

  afterAll(async () => {
    await fs.rm(templatesDir, { recursive: true, force: true })
  })

  it('reads a template by its relative identity', async () => {
    expect(await reader.read('home/index.svelte')).toEqual({ identity: 'home/index.svelte', text: '<h1>Home</h1>\n' })
  })

  it('re-reads on every call', async () => {
    const file = path.join(templatesDir, 'home', 'index.svelte')
    await fs.writeFile(file, '<h1>Edited</h1>\n')

    expect((await reader.read('home/index.svelte')).text).toBe('<h1>Edited</h1>\n')
    await fs.writeFile(file, '<h1>Home</h1>\n')
  })

  it('reports missing templates and directories as not found', async () => {
    await expect(reader.read('home/missing.svelte')).rejects.toThrow(NotFoundError)
    await expect(reader.read('home')).rejects.toThrow('Template home not found')
  })

  it('rejects identities outside the templates directory', async () => {
    await expect(reader.read('../secret.svelte')).rejects.toThrow(ValidationError)
    expect(() => reader.resolve('/etc/passwd')).toThrow('Component identity escapes the templates directory: /etc/passwd')
  })
})
