/**
 * File Source Reader
 *
 * Reads component sources from the project's templates directory. Identities
 * are paths relative to that directory, e.g. `todos/index.svelte`.
 */

import path from 'node:path'
import { promises as fs } from 'node:fs'
import {
  NotFoundError,
  ValidationError,
  type ComponentSource,
  type ComponentSourceReader,
} from '@hydrant/runtime-core'

export class FileSourceReader implements ComponentSourceReader {
  private root: string

  constructor(templatesDir: string) {
    this.root = path.resolve(templatesDir)
  }

  resolve(identity: string): string {
    const resolved = path.resolve(this.root, identity)
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new ValidationError(`Component identity escapes the templates directory: ${identity}`)
    }
    return resolved
  }

  async read(identity: string): Promise<ComponentSource> {
    const file = this.resolve(identity)
    try {
      const text = await fs.readFile(file, 'utf8')
      return { identity, text }
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Template ${identity}`)
      }
      throw error
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')
}
