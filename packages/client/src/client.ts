import type { ReadableStreamDefaultReader } from 'node:stream/web'
import type { ClientConfig } from '@shoal/config'
import { getLogger } from '@shoal/telemetry'
import { Deadline, StopWatcher } from './deadline.js'
import { createApiError } from './errors.js'
import { LineBuffer, parseJson } from './ndjson.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

/** The subset of `fetch` the client needs. Tests pass an in-process app here. */
export type FetchLike = (request: Request) => Promise<Response>

export interface ApiClientOptions {
  /** Base for relative URLs, without a trailing slash. */
  server: string
  fetch?: FetchLike
  /** Sent with every request; per-call headers take precedence. */
  headers?: Record<string, string>
  /** Default timeout for non-streaming calls. */
  requestTimeoutMs?: number
  /** Server-side `timeoutSeconds` for watch requests. */
  watchTimeoutSeconds?: number
  userAgent?: string
}

export interface RequestOptions {
  payload?: unknown
  headers?: Record<string, string>
  /** Bound on the whole call. Falls back to the client's `requestTimeoutMs`. */
  timeoutMs?: number
}

export type ReadOptions = Omit<RequestOptions, 'payload'>

export interface StreamOptions {
  headers?: Record<string, string>
  /** Bound on the whole stream: connection plus every wait for more bytes. */
  timeoutMs?: number
  /**
   * Cooperative cancellation. Once aborted, no more bytes are requested and
   * the sequence ends normally after the records already decoded.
   */
  stopSignal?: AbortSignal
}

interface SendOptions extends RequestOptions {
  contentType?: string
}

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i
const MERGE_PATCH = 'application/merge-patch+json'

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

function decodeErrorPayload(text: string): unknown {
  if (text === '') return undefined
  try {
    return JSON.parse(text) as unknown
  } catch {
    return text
  }
}

/**
 * HTTP client for a resource-oriented API.
 *
 * `request()` is the raw primitive: it resolves the URL, escalates every
 * non-2xx status to an {@link ApiError}, and returns the unparsed response.
 * `get`/`post`/`patch`/`delete` parse JSON bodies. `stream()` reads a
 * newline-delimited JSON body record by record.
 *
 * Nothing here retries; every failure goes to the caller.
 *
 * @example
 * ```ts
 * const client = new ApiClient({ server: 'https://kube.example:6443' })
 * const pod = await client.get('/api/v1/namespaces/default/pods/web-0')
 * for await (const event of client.stream('/api/v1/pods?watch=true', { stopSignal })) {
 *   console.log(event)
 * }
 * ```
 */
export class ApiClient {
  readonly server: string
  readonly watchTimeoutSeconds: number | undefined
  private readonly fetchFn: FetchLike
  private readonly headers: Record<string, string>
  private readonly requestTimeoutMs: number | undefined
  private readonly userAgent: string | undefined
  private readonly logger = getLogger(['shoal', 'client'])

  constructor(options: ApiClientOptions) {
    this.server = options.server
    this.fetchFn = options.fetch ?? ((request) => fetch(request))
    this.headers = options.headers ?? {}
    this.requestTimeoutMs = options.requestTimeoutMs
    this.watchTimeoutSeconds = options.watchTimeoutSeconds
    this.userAgent = options.userAgent
  }

  static fromConfig(config: ClientConfig, fetchFn?: FetchLike): ApiClient {
    return new ApiClient({
      server: config.server,
      requestTimeoutMs: config.requestTimeoutMs,
      watchTimeoutSeconds: config.watchTimeoutSeconds,
      userAgent: config.userAgent,
      fetch: fetchFn,
    })
  }

  /** Absolute URLs pass through; anything else is appended to the server. */
  resolveUrl(url: string): string {
    return ABSOLUTE_URL.test(url) ? url : `${this.server}${url}`
  }

  /**
   * Perform one call and return the raw response. The body is not read on
   * success, so non-JSON responses are fine here.
   */
  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    const controller = new AbortController()
    const deadline = new Deadline(options.timeoutMs ?? this.requestTimeoutMs, controller)
    try {
      return await this.send(method, url, options, controller, deadline)
    } finally {
      deadline.clear()
    }
  }

  async get(url: string, options: ReadOptions = {}): Promise<unknown> {
    const { headers, timeoutMs } = options
    return this.requestJson('GET', url, { headers, timeoutMs })
  }

  async post(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.requestJson('POST', url, options)
  }

  /** Sends the payload as a JSON merge patch unless the headers say otherwise. */
  async patch(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.requestJson('PATCH', url, { ...options, contentType: MERGE_PATCH })
  }

  async delete(url: string, options: RequestOptions = {}): Promise<unknown> {
    return this.requestJson('DELETE', url, options)
  }

  /**
   * Stream a newline-delimited JSON body, one decoded record per line, in
   * the order the lines arrive.
   *
   * Every wait (connection, next chunk) is raced against the stop signal
   * and the deadline. All lines completed by a chunk are yielded before
   * the next wait, so a stop never drops a record that was fully received.
   * An unterminated trailing line is never yielded.
   */
  async *stream(url: string, options: StreamOptions = {}): AsyncGenerator<unknown, void, undefined> {
    const { stopSignal } = options
    const controller = new AbortController()
    const deadline = new Deadline(options.timeoutMs, controller)
    const stop = new StopWatcher(stopSignal)
    const lines = new LineBuffer()
    let reader: ReadableStreamDefaultReader<Uint8Array> | undefined

    try {
      if (stopSignal?.aborted) return

      const opened = await stop.race(
        this.send('GET', url, { headers: options.headers }, controller, deadline)
      )
      if (!opened) {
        this.logger.debug`Stream from ${url} stopped while connecting`
        return
      }
      const body = opened.value.body
      if (!body) return
      reader = body.getReader()

      while (true) {
        if (stopSignal?.aborted) break
        const next = await stop.race(deadline.race(reader.read()))
        if (!next) break
        const chunk = next.value
        if (chunk.done) {
          this.logger.debug`Stream from ${url} ended`
          return
        }
        for (const line of lines.push(chunk.value)) {
          yield parseJson(line)
        }
      }
      this.logger.debug`Stream from ${url} stopped`
    } finally {
      const tail = lines.terminate()
      if (tail.trim() !== '') {
        this.logger.debug`Discarding an unterminated line of ${tail.length} characters from ${url}`
      }
      deadline.clear()
      if (reader) {
        await reader.cancel().catch((err: unknown) => {
          this.logger.debug`Stream from ${url} was already closed: ${err}`
        })
      }
      controller.abort()
    }
  }

  private async requestJson(method: HttpMethod, url: string, options: SendOptions): Promise<unknown> {
    const controller = new AbortController()
    const deadline = new Deadline(options.timeoutMs ?? this.requestTimeoutMs, controller)
    try {
      const response = await this.send(method, url, options, controller, deadline)
      const text = await deadline.race(response.text())
      return parseJson(text)
    } finally {
      deadline.clear()
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    options: SendOptions,
    controller: AbortController,
    deadline: Deadline
  ): Promise<Response> {
    const request = this.buildRequest(method, url, options, controller.signal)
    this.logger.debug`${method} ${request.url}`

    const response = await deadline.race(this.fetchFn(request))
    if (!isSuccess(response.status)) {
      const text = await deadline.race(response.text())
      throw createApiError(response.status, decodeErrorPayload(text))
    }
    return response
  }

  private buildRequest(
    method: HttpMethod,
    url: string,
    options: SendOptions,
    signal: AbortSignal
  ): Request {
    const headers = new Headers({ Accept: 'application/json' })
    if (this.userAgent) headers.set('User-Agent', this.userAgent)
    for (const [name, value] of Object.entries(this.headers)) headers.set(name, value)

    let body: string | undefined
    // GET carries no body over HTTP; a payload passed to it is ignored
    if (options.payload !== undefined && method !== 'GET') {
      body = JSON.stringify(options.payload)
      headers.set('Content-Type', options.contentType ?? 'application/json')
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) headers.set(name, value)

    return new Request(this.resolveUrl(url), { method, headers, body, signal })
  }
}
