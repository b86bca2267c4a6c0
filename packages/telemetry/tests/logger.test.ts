import { afterEach, describe, expect, it, vi } from 'vitest'
import { configureLogger, getLogger, resetLogger } from '../src/index.js'

describe('configureLogger', () => {
  afterEach(async () => {
    vi.restoreAllMocks()
    await resetLogger()
  })

  it('writes JSON lines to stdout in production', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await configureLogger({ environment: 'production', level: 'debug' })

    getLogger(['shoal', 'test']).info`hello ${'world'} ${42}`

    expect(write).toHaveBeenCalledTimes(1)
    const line = String(write.mock.calls[0]?.[0])
    expect(line.endsWith('\n')).toBe(true)
    expect(JSON.parse(line)).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      category: 'shoal.test',
      message: 'hello world 42',
    })
  })

  it('keeps the name and message of logged errors', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await configureLogger({ environment: 'production', level: 'debug' })

    getLogger(['shoal', 'test']).error('failed', { error: new TypeError('boom') })

    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toMatchObject({
      message: 'failed',
      properties: { error: { name: 'TypeError', message: 'boom' } },
    })
  })

  it('drops records below the configured level', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await configureLogger({ environment: 'production', level: 'warning' })

    const logger = getLogger(['shoal', 'test'])
    logger.info`not shown`
    logger.warn`shown`

    expect(write).toHaveBeenCalledTimes(1)
    expect(JSON.parse(String(write.mock.calls[0]?.[0]))).toMatchObject({
      level: 'warning',
      message: 'shown',
    })
  })

  it('ignores loggers outside the root category', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await configureLogger({ environment: 'production', level: 'debug' })

    getLogger(['elsewhere']).error`not routed`

    expect(write).not.toHaveBeenCalled()
  })

  it('writes text lines to the console outside production', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    await configureLogger({ environment: 'development', level: 'info' })

    getLogger(['shoal', 'client']).info`ready`

    expect(log).toHaveBeenCalledTimes(1)
    expect(String(log.mock.calls[0]?.[0])).toMatch(/^\d\d:\d\d:\d\d\.\d{3} INFO {4}shoal\.client: ready$/)
  })

  it('keeps the first configuration when called again', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    await configureLogger({ environment: 'test', level: 'info' })
    await configureLogger({ environment: 'production', level: 'debug' })

    getLogger(['shoal', 'test']).debug`below the first level`
    getLogger(['shoal', 'test']).info`shown as text`

    expect(write).not.toHaveBeenCalled()
    expect(log).toHaveBeenCalledTimes(1)
  })
})
