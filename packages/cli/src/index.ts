#!/usr/bin/env tsx

/**
 * Hydrant CLI
 *
 * Command-line interface for Hydrant projects.
 */

import { Command, InvalidArgumentError } from 'commander'
import { buildCommand, devCommand, newCommand, serveCommand, validateCommand } from './commands/index.js'

const program = new Command()

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Expected an integer between 0 and 65535.')
  }
  return port
}

program
  .name('hydrant')
  .description('Hydrant - server-rendered Svelte pages that hydrate in the browser')
  .version('0.1.0')

// Dev command
program
  .command('dev')
  .description('Start the development server with config hot reload')
  .option('-d, --dir <path>', 'Project directory', '.')
  .option('-p, --port <number>', 'Port to listen on (overrides the configuration)', parsePort)
  .option('-H, --host <host>', 'Host to bind to (overrides the configuration)')
  .action(async (options: { dir: string; port?: number; host?: string }) => {
    await devCommand(options)
  })

// Serve command
program
  .command('serve')
  .description('Start the production server')
  .option('-d, --dir <path>', 'Project directory', '.')
  .option('-p, --port <number>', 'Port to listen on (overrides the configuration)', parsePort)
  .option('-H, --host <host>', 'Host to bind to (overrides the configuration)')
  .action(async (options: { dir: string; port?: number; host?: string }) => {
    await serveCommand(options)
  })

// Build command
program
  .command('build')
  .description('Compile every template and write the client runtime bundle')
  .option('-d, --dir <path>', 'Project directory', '.')
  .action(async (options: { dir: string }) => {
    await buildCommand(options)
  })

// Validate command
program
  .command('validate')
  .description('Validate the project configuration without starting the engine')
  .option('-d, --dir <path>', 'Project directory', '.')
  .action(async (options: { dir: string }) => {
    await validateCommand(options)
  })

// New command
program
  .command('new')
  .description('Scaffold a new project')
  .argument('<name>', 'Project directory to create')
  .action(async (name: string) => {
    await newCommand(name)
  })

// Parse arguments
await program.parseAsync()
