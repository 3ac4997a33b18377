import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, silentLogger } from './logger'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints log and success unless quiet', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger(false, false).success('5 records')
    createLogger(true, false).success('hidden')
    createLogger(true, false).log('hidden')

    expect(consoleLog).toHaveBeenCalledTimes(1)
    expect(consoleLog).toHaveBeenCalledWith('  ✓ 5 records')
  })

  it('prints verbose messages only in verbose mode', () => {
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger(false, false).verbose('hidden')
    createLogger(false, true).verbose('Processed page 1 of 2')

    expect(consoleLog).toHaveBeenCalledTimes(1)
    expect(consoleLog).toHaveBeenCalledWith('  [debug] Processed page 1 of 2')
  })

  it('always prints warnings and errors', () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    const logger = createLogger(true, false)
    logger.warn('Cache not updated')
    logger.error('Error connecting to https://api.example.test')

    expect(consoleWarn).toHaveBeenCalledWith('  ! Cache not updated')
    expect(consoleError).toHaveBeenCalledWith('  ✗ Error connecting to https://api.example.test')
  })

  it('draws a progress bar and ends the line on the last page', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

    const logger = createLogger(false, false)
    logger.progress('pages', 1, 2)
    logger.progress('pages', 2, 2)

    expect(write).toHaveBeenNthCalledWith(1, `\r  [${'█'.repeat(20)}${'░'.repeat(20)}] 50% pages`)
    expect(write).toHaveBeenNthCalledWith(2, `\r  [${'█'.repeat(40)}] 100% pages`)
    expect(write).toHaveBeenNthCalledWith(3, '\n')
  })

  it('skips progress for empty results', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)

    createLogger(false, false).progress('pages', 1, 0)

    expect(write).not.toHaveBeenCalled()
  })
})

describe('silentLogger', () => {
  it('writes nothing', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    silentLogger.error('nope')
    expect(consoleError).not.toHaveBeenCalled()
    consoleError.mockRestore()
  })
})
