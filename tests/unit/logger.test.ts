import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createConsoleLogger,
  createPrefixedLogger,
  createSilentLogger,
} from '../../src/utils/logger'
import { createSpyLogger } from '../fixtures/meetings'

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('drops debug output unless debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    createConsoleLogger().debug('hidden')
    expect(log).not.toHaveBeenCalled()

    createConsoleLogger({ debug: true }).debug('shown', { recordId: 1 })
    expect(log).toHaveBeenCalledWith('[DEBUG] shown', { recordId: 1 })
  })

  it('sends warnings to stderr', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createConsoleLogger().warn('careful')
    expect(warn).toHaveBeenCalledWith('[WARN] careful', '')
  })
})

describe('createPrefixedLogger', () => {
  it('prefixes every message with the component name', () => {
    const base = createSpyLogger()
    const logger = createPrefixedLogger('index', base)

    logger.info('scanned', { files: 2 })
    logger.error('failed')

    expect(base.info).toHaveBeenCalledWith('[index] scanned', { files: 2 })
    expect(base.error).toHaveBeenCalledWith('[index] failed', undefined)
  })
})

describe('createSilentLogger', () => {
  it('accepts every level without output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const logger = createSilentLogger()

    logger.debug('a')
    logger.info('b')
    expect(log).not.toHaveBeenCalled()
    log.mockRestore()
  })
})
