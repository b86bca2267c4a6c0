import { setTimeout as sleep } from 'node:timers/promises'
import { getLogger } from '@shoal/telemetry'
import type { Logger } from '@shoal/telemetry'

/**
 * Error-throttling state of one resource. Empty while the resource is
 * handled normally.
 */
export class Throttler {
  /** Epoch milliseconds until which the resource is not handled. */
  activeUntil: number | undefined
  lastUsedDelayMs: number | undefined
  /** Delays not used yet in the current throttling period. */
  pendingDelaysMs: number[] | undefined
}

export interface ThrottleOptions {
  /** Delays after consecutive failures; the last one repeats. */
  delaysMs: readonly number[]
  /** Interrupts any throttling wait. */
  stopSignal?: AbortSignal
  logger?: Logger
}

const defaultLogger = getLogger(['shoal', 'reactor', 'throttling'])

/** Wait for `delayMs`; `false` if `signal` interrupted the wait. */
async function pause(delayMs: number, signal: AbortSignal | undefined): Promise<boolean> {
  try {
    await sleep(Math.max(0, delayMs), undefined, { signal })
    return true
  } catch (err) {
    if (signal?.aborted) return false
    throw err
  }
}

/**
 * Run `fn` unless the resource is being throttled after earlier failures.
 *
 * A remaining throttling period is waited out first. A failure of `fn` is
 * logged, not thrown: it starts (or continues) throttling with the next
 * delay, which is waited out before returning. A success ends throttling.
 *
 * @returns whether `fn` ran and succeeded
 */
export async function throttled(
  throttler: Throttler,
  fn: () => Promise<void> | void,
  options: ThrottleOptions
): Promise<boolean> {
  const { delaysMs, stopSignal, logger = defaultLogger } = options

  if (throttler.activeUntil !== undefined) {
    if (!(await pause(throttler.activeUntil - Date.now(), stopSignal))) {
      return false
    }
    throttler.activeUntil = undefined
    logger.info`Throttling is over. Switching back to normal operations.`
  }

  try {
    await fn()
  } catch (err) {
    throttler.pendingDelaysMs ??= [...delaysMs]
    const delayMs = throttler.pendingDelaysMs.shift() ?? throttler.lastUsedDelayMs
    if (delayMs === undefined) {
      logger.error`Unexpected error, no throttling delays configured: ${err}`
      return false
    }
    throttler.lastUsedDelayMs = delayMs
    throttler.activeUntil = Date.now() + delayMs
    logger.error`Throttling for ${delayMs}ms due to an unexpected error: ${err}`

    if (await pause(delayMs, stopSignal)) {
      throttler.activeUntil = undefined
      logger.info`Throttling is over. Switching back to normal operations.`
    }
    return false
  }

  throttler.pendingDelaysMs = undefined
  throttler.lastUsedDelayMs = undefined
  return true
}
