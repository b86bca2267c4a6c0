import { describe, expect, it, vi } from 'vitest'
import { Throttler, throttled } from '../src/throttling.js'

const failing = () => {
  throw new Error('boom')
}

describe('throttled', () => {
  it('runs the function and reports success', async () => {
    const throttler = new Throttler()
    const fn = vi.fn()

    const succeeded = await throttled(throttler, fn, { delaysMs: [10] })

    expect(succeeded).toBe(true)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(throttler.activeUntil).toBeUndefined()
    expect(throttler.lastUsedDelayMs).toBeUndefined()
  })

  it('waits out the first delay after a failure instead of throwing', async () => {
    const throttler = new Throttler()
    const started = Date.now()

    const succeeded = await throttled(throttler, failing, { delaysMs: [50, 100] })

    expect(succeeded).toBe(false)
    expect(Date.now() - started).toBeGreaterThanOrEqual(40)
    expect(throttler.lastUsedDelayMs).toBe(50)
    expect(throttler.pendingDelaysMs).toEqual([100])
    expect(throttler.activeUntil).toBeUndefined()
  })

  it('accepts async failures', async () => {
    const throttler = new Throttler()

    const succeeded = await throttled(
      throttler,
      async () => {
        throw new Error('boom')
      },
      { delaysMs: [1] }
    )

    expect(succeeded).toBe(false)
    expect(throttler.lastUsedDelayMs).toBe(1)
  })

  it('steps through the delays and repeats the last one', async () => {
    const throttler = new Throttler()
    const used: (number | undefined)[] = []

    for (let i = 0; i < 4; i++) {
      await throttled(throttler, failing, { delaysMs: [1, 2, 3] })
      used.push(throttler.lastUsedDelayMs)
    }

    expect(used).toEqual([1, 2, 3, 3])
  })

  it('resets after a success', async () => {
    const throttler = new Throttler()
    await throttled(throttler, failing, { delaysMs: [1, 2] })

    await throttled(throttler, () => undefined, { delaysMs: [1, 2] })
    await throttled(throttler, failing, { delaysMs: [1, 2] })

    expect(throttler.lastUsedDelayMs).toBe(1)
    expect(throttler.pendingDelaysMs).toEqual([2])
  })

  it('does not throttle without delays', async () => {
    const throttler = new Throttler()

    const succeeded = await throttled(throttler, failing, { delaysMs: [] })

    expect(succeeded).toBe(false)
    expect(throttler.activeUntil).toBeUndefined()
  })

  it('stops waiting when stopped, and skips the function while still throttled', async () => {
    const throttler = new Throttler()
    const stopper = new AbortController()
    const timer = setTimeout(() => stopper.abort(), 20)
    const started = Date.now()

    const first = await throttled(throttler, failing, {
      delaysMs: [60_000],
      stopSignal: stopper.signal,
    })
    clearTimeout(timer)

    expect(first).toBe(false)
    expect(Date.now() - started).toBeLessThan(5_000)
    expect(throttler.activeUntil).toBeGreaterThan(Date.now())

    const fn = vi.fn()
    const second = await throttled(throttler, fn, {
      delaysMs: [60_000],
      stopSignal: stopper.signal,
    })

    expect(second).toBe(false)
    expect(fn).not.toHaveBeenCalled()
  })

  it('waits out a remaining period before running again', async () => {
    const throttler = new Throttler()
    throttler.activeUntil = Date.now() + 50
    const fn = vi.fn()
    const started = Date.now()

    const succeeded = await throttled(throttler, fn, { delaysMs: [1] })

    expect(succeeded).toBe(true)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(Date.now() - started).toBeGreaterThanOrEqual(40)
    expect(throttler.activeUntil).toBeUndefined()
  })
})
