import { RequestTimeoutError } from './errors.js'

/**
 * Settle with `promise`, or with `onAbort()` once `signal` aborts.
 *
 * The abort listener lives only as long as this one wait, so nothing
 * long-lived keeps a reference to the value `promise` settles with.
 */
function raceSignal<T, U>(
  promise: Promise<T>,
  signal: AbortSignal,
  onAbort: () => U
): Promise<T | U> {
  return new Promise<T | U>((resolve, reject) => {
    const listener = () => {
      try {
        resolve(onAbort())
      } catch (err) {
        reject(err)
      }
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', listener)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', listener)
        reject(err)
      }
    )
    if (signal.aborted) {
      listener()
    } else {
      signal.addEventListener('abort', listener, { once: true })
    }
  })
}

/**
 * One timeout for a whole operation: every wait of the operation is raced
 * against the same timer, so the total time is bounded, not each wait.
 *
 * When the timer fires, the attached controller is aborted so the
 * underlying fetch releases its connection.
 */
export class Deadline {
  private readonly expiry = new AbortController()
  private _timer: ReturnType<typeof setTimeout> | undefined

  constructor(
    readonly timeoutMs: number | undefined,
    controller: AbortController
  ) {
    if (timeoutMs === undefined) return
    this._timer = setTimeout(() => {
      this._timer = undefined
      const error = new RequestTimeoutError(timeoutMs)
      this.expiry.abort(error)
      controller.abort(error)
    }, timeoutMs)
  }

  /** Await `promise`, or throw {@link RequestTimeoutError} if the deadline passes first. */
  async race<T>(promise: Promise<T>): Promise<T> {
    const { timeoutMs } = this
    if (timeoutMs === undefined) return promise
    return raceSignal(promise, this.expiry.signal, () => {
      throw new RequestTimeoutError(timeoutMs)
    })
  }

  /** Stop the timer. The operation is over, whatever its outcome. */
  clear(): void {
    if (this._timer !== undefined) {
      clearTimeout(this._timer)
      this._timer = undefined
    }
  }
}

/** Races waits against a cooperative stop signal. */
export class StopWatcher {
  constructor(private readonly signal: AbortSignal | undefined) {}

  /** Await `promise` unless the signal is aborted first; `undefined` means stopped. */
  async race<T>(promise: Promise<T>): Promise<{ value: T } | undefined> {
    const wrapped = promise.then((value) => ({ value }))
    if (!this.signal) return wrapped
    return raceSignal(wrapped, this.signal, () => undefined)
  }
}
