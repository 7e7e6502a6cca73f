/**
 * New Command
 *
 * Scaffolds a project: configuration, a home controller and a counter
 * component, copied from the templates shipped with the CLI.
 */

import path from 'node:path'
import { promises as fs } from 'node:fs'
import { fileURLToPath } from 'node:url'

export const TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url))

const PROJECT_NAME = /^[A-Za-z0-9][\w.-]*$/
const NAME_PLACEHOLDER = '{{name}}'

export interface ScaffoldOptions {
  /** Where the project directory is created */
  cwd?: string
  templateDir?: string
}

export interface ScaffoldResult {
  projectDir: string
  /** Written files, relative to the project directory */
  files: string[]
}

export async function scaffoldProject(name: string, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
  if (!PROJECT_NAME.test(name)) {
    throw new Error(`Invalid project name "${name}": use letters, digits, ".", "_" and "-"`)
  }

  const projectDir = path.resolve(options.cwd ?? process.cwd(), name)
  if (await isNonEmptyDirectory(projectDir)) {
    throw new Error(`Directory ${projectDir} already exists and is not empty`)
  }

  const templateDir = options.templateDir ?? TEMPLATE_DIR
  const files = await listFiles(templateDir)

  for (const relative of files) {
    const content = await fs.readFile(path.join(templateDir, relative), 'utf8')
    const target = path.join(projectDir, relative)
    await fs.mkdir(path.dirname(target), { recursive: true })
    // JSON strings are valid double-quoted YAML scalars
    await fs.writeFile(target, content.split(NAME_PLACEHOLDER).join(JSON.stringify(name)))
  }

  return { projectDir, files }
}

export async function newCommand(name: string): Promise<void> {
  try {
    const { projectDir, files } = await scaffoldProject(name)
    console.log(`✨ Created ${name}`)
    for (const file of files) {
      console.log(`   + ${file}`)
    }
    console.log('')
    console.log('Next steps:')
    console.log(`   cd ${path.relative(process.cwd(), projectDir) || '.'}`)
    console.log('   hydrant dev')
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`)
    process.exit(1)
  }
}

async function isNonEmptyDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.readdir(dir)).length > 0
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false
    throw error
  }
}

async function listFiles(dir: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true })
  const files: string[] = []

  for (const entry of entries) {
    const relative = prefix ? path.join(prefix, entry.name) : entry.name
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)))
    } else if (entry.isFile()) {
      files.push(relative)
    }
  }

  return files.sort()
}
