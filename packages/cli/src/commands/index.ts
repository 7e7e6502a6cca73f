export { devCommand, type DevOptions } from './dev.js'
export { serveCommand, type ServeOptions } from './serve.js'
export { buildCommand, type BuildOptions } from './build.js'
export { validateCommand, type ValidateOptions } from './validate.js'
export { newCommand, scaffoldProject, type ScaffoldOptions, type ScaffoldResult } from './new.js'
