import { ResponseDecodeError } from './errors.js'

/**
 * - `awaiting`: nothing buffered, waiting for bytes
 * - `accumulating`: an unterminated line is buffered
 * - `terminated`: no more input is accepted
 */
export type LineBufferState = 'awaiting' | 'accumulating' | 'terminated'

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown
  } catch (err) {
    throw new ResponseDecodeError(text, err)
  }
}

/**
 * Line framing for newline-delimited JSON bodies.
 *
 * Bytes are decoded as UTF-8 across chunk boundaries. Each complete line is
 * released once; blank lines are skipped. An unterminated tail stays
 * buffered and is never released.
 */
export class LineBuffer {
  private readonly _text = new TextDecoder('utf-8')
  private _buffer = ''
  private _state: LineBufferState = 'awaiting'

  get state(): LineBufferState {
    return this._state
  }

  /** Feed a chunk; returns every line it completed, oldest first. */
  push(chunk: Uint8Array): string[] {
    if (this._state === 'terminated') {
      throw new Error('LineBuffer is terminated')
    }
    this._buffer += this._text.decode(chunk, { stream: true })

    const lines = this._buffer.split('\n')
    this._buffer = lines.pop() ?? ''
    this._state = this._buffer.length > 0 ? 'accumulating' : 'awaiting'

    const complete: string[] = []
    for (const line of lines) {
      const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line
      if (trimmed.trim() === '') continue
      complete.push(trimmed)
    }
    return complete
  }

  /**
   * Stop accepting input. Returns the unterminated tail, which is discarded.
   */
  terminate(): string {
    const tail = this._buffer + this._text.decode()
    this._buffer = ''
    this._state = 'terminated'
    return tail
  }
}
