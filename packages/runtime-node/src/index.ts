/**
 * Hydrant Runtime for Node.js
 *
 * Svelte compiler adapter, artifact cache, vm sandbox and the Hono server,
 * plus everything from the platform-agnostic core.
 */

// Re-export everything from core
export * from '@hydrant/runtime-core'

// Engine
export * from './types/engine.js'
export { HydrantEngine, listTemplates, type BuildReport } from './engine.js'
export * from './engine/server-manager.js'

// Rendering pipeline
export * from './compiler/svelte-compiler.js'
export * from './artifacts/artifact-cache.js'
export * from './sandbox/runtime-bridge.js'
export * from './sandbox/execution-sandbox.js'
export * from './render/file-source-reader.js'
export * from './render/page-renderer.js'
export * from './assets/asset-manager.js'

// Project plumbing
export * from './config/config-loader.js'
export * from './routing/route-table.js'
export * from './controllers/controller-loader.js'
export * from './hot-reload/config-watcher.js'

// Errors
export * from './errors/error-handler.js'
