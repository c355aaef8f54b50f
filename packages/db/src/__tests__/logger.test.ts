import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from '../logger'

describe('createLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-05-04T09:07:03.000Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('prefixes lines with the UTC time', () => {
    const sink = { log: vi.fn(), error: vi.fn() }

    createLogger('info', sink).info('Created tenants table')

    expect(sink.log).toHaveBeenCalledWith('[09:07:03] Created tenants table')
  })

  it('sends errors to the error stream', () => {
    const sink = { log: vi.fn(), error: vi.fn() }
    const logger = createLogger('info', sink)

    logger.warn('slow')
    logger.error('failed')

    expect(sink.log).toHaveBeenCalledWith('[09:07:03] WARN slow')
    expect(sink.error).toHaveBeenCalledWith('[09:07:03] ERROR failed')
  })

  it('drops lines below the configured level', () => {
    const sink = { log: vi.fn(), error: vi.fn() }
    const logger = createLogger('warn', sink)

    logger.debug('CREATE TABLE tenants (...)')
    logger.info('Created tenants table')

    expect(sink.log).not.toHaveBeenCalled()
  })

  it('prints statement text at debug level', () => {
    const sink = { log: vi.fn(), error: vi.fn() }

    createLogger('debug', sink).debug('CREATE TABLE tenants (...)')

    expect(sink.log).toHaveBeenCalledWith('[09:07:03] CREATE TABLE tenants (...)')
  })
})
