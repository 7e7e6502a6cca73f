import { describe, it, expect } from 'vitest'
import {
  AppError,
  ConfigurationError,
  NotFoundError,
  isOperationalError,
} from './base-error.js'
import {
  ComponentCompileError,
  ComponentRuntimeError,
  ContextSerializationError,
  MissingAccessorError,
} from './render-errors.js'

describe('base-error', () => {
  it('serializes app errors to JSON', () => {
    class TestError extends AppError {
      constructor() {
        super('test', 'TEST', 418, true, { a: 1 })
      }
    }

    const error = new TestError()
    expect(error.toJSON()).toEqual({
      name: 'TestError',
      message: 'test',
      code: 'TEST',
      statusCode: 418,
      context: { a: 1 },
    })
    expect(error).toBeInstanceOf(Error)
  })

  it('uses expected defaults for common errors', () => {
    expect(new NotFoundError('Page /x').message).toBe('Page /x not found')
    expect(new NotFoundError('Page /x').statusCode).toBe(404)
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR')
    expect(new ConfigurationError('bad').isOperational).toBe(false)
  })

  it('detects operational errors', () => {
    expect(isOperationalError(new NotFoundError('x'))).toBe(true)
    expect(isOperationalError(new ConfigurationError('x'))).toBe(false)
    expect(isOperationalError(new Error('plain'))).toBe(false)
  })
})

describe('render-errors', () => {
  it('carries compile location and target', () => {
    const error = new ComponentCompileError('Unexpected token', {
      identity: 'home/index',
      target: 'server',
      location: { line: 3, column: 7 },
      compilerCode: 'js_parse_error',
    })

    expect(error.code).toBe('COMPILE_ERROR')
    expect(error.target).toBe('server')
    expect(error.context).toEqual({
      identity: 'home/index',
      target: 'server',
      location: { line: 3, column: 7 },
      compilerCode: 'js_parse_error',
    })
  })

  it('keeps the underlying script error as the cause', () => {
    const cause = new TypeError('x is undefined')
    const error = new ComponentRuntimeError('Render failed', 'counter', { cause, scriptStack: 'stack' })

    expect(error.cause).toBe(cause)
    expect(error.scriptStack).toBe('stack')
    expect(error.statusCode).toBe(500)
  })

  it('treats a missing accessor as a non-operational failure', () => {
    const error = new MissingAccessorError('getDoc')
    expect(error.isOperational).toBe(false)
    expect(error.message).toBe('Generated code expects "getDoc" but the runtime bridge does not provide it')
    expect(error.context).toEqual({ accessor: 'getDoc' })
  })

  it('names the offending path of unserializable context', () => {
    const error = new ContextSerializationError('componentData', '$.items[0]', 'function value')
    expect(error.message).toBe('componentData is not JSON-representable at $.items[0]: function value')
    expect(error.code).toBe('UNSERIALIZABLE_CONTEXT')
  })
})
