/**
 * Hydrant Runtime Core
 *
 * Platform-agnostic half of the rendering bridge: escaping, context
 * separation, artifact preparation and the hydration bootstrap.
 * No Node.js or platform-specific dependencies.
 */

// Platform Ports
export * from './ports.js'

// Types
export * from './types/render.js'

// Errors
export * from './errors/base-error.js'
export * from './errors/render-errors.js'

// Security
export * from './security/html-escape.js'
export * from './security/error-sanitizer.js'

// Context Separation
export * from './context/context-surface.js'
export * from './context/document-metadata.js'
export * from './context/head-renderer.js'

// Artifacts
export * from './artifacts/prepare-artifact.js'

// Hydration
export * from './hydration/bootstrap-generator.js'
export * from './hydration/client-hydrator.js'

// Configuration
export * from './config/config-parser.js'

// Rendering
export * from './renderer/document-wrapper.js'
