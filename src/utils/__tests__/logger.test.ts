/**
 * Unit tests for src/utils/logger.ts: level selection and redaction.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { REDACT_PATHS, childLogger, createLogger, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A synchronous pino logger with the relay's redaction, writing JSON lines to memory */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino({ name, level: 'trace', redact: REDACT_PATHS }, stream)
  return { logger, getLines: () => lines }
}

const savedEnv = { LOG_LEVEL: process.env.LOG_LEVEL, NODE_ENV: process.env.NODE_ENV }

afterEach(() => {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }
})

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('takes an explicit level over the environment', () => {
    expect(createLogger('state-store', { level: 'error', pretty: false }).level).toBe('error')
  })

  it('uses LOG_LEVEL when set', () => {
    process.env.LOG_LEVEL = 'warn'
    expect(createLogger('feedback-engine', { pretty: false }).level).toBe('warn')
  })

  it('uses info level in production', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'production'
    expect(createLogger('scheduler', { pretty: false }).level).toBe('info')
  })

  it('uses debug level in development and test', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'test'
    expect(createLogger('scheduler', { pretty: false }).level).toBe('debug')
  })
})

describe('childLogger', () => {
  it('carries the bindings into every line', () => {
    const { logger, getLines } = createCapturingLogger('stage-orchestrator')
    childLogger(logger, { runId: 'run-1' }).info('stage started')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toMatchObject({ runId: 'run-1', msg: 'stage started' })
  })
})

describe('redaction', () => {
  it('redacts credential fields at the top level and one level down', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ token: 'test-secret', executor: { api_key: 'test-secret' } }, 'dispatching')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toMatchObject({ token: '[Redacted]', executor: { api_key: '[Redacted]' } })
  })

  it('redacts credentials in work order metadata', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ metadata: { credentials: 'test-secret', region: 'eu' } }, 'work order')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toMatchObject({ metadata: { credentials: '[Redacted]', region: 'eu' } })
  })
})

// Runs last: the override stays in place for the rest of the module
describe('setLogLevel', () => {
  it('is ignored while LOG_LEVEL is set', () => {
    process.env.LOG_LEVEL = 'warn'
    const existing = createLogger('config', { pretty: false })
    setLogLevel('error')
    expect(existing.level).toBe('warn')
  })

  it('applies to existing and later loggers but not to explicit levels', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'test'
    const existing = createLogger('config', { pretty: false })
    const pinned = createLogger('pinned', { level: 'trace', pretty: false })

    setLogLevel('error')

    expect(existing.level).toBe('error')
    expect(pinned.level).toBe('trace')
    expect(createLogger('later', { pretty: false }).level).toBe('error')
  })
})
