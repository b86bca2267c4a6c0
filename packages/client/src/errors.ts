import { z } from 'zod'

/**
 * The `Status` object an API server returns alongside most failures.
 * Only the fields this client reads are declared; the rest pass through.
 */
export const StatusSchema = z
  .object({
    kind: z.literal('Status'),
    status: z.string().optional(),
    code: z.number().int().optional(),
    reason: z.string().optional(),
    message: z.string().optional(),
    details: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough()

export type Status = z.infer<typeof StatusSchema>

/**
 * A response with a status outside 200–299.
 *
 * `payload` is the response body: parsed JSON when it parses, the raw text
 * otherwise, `undefined` for an empty body.
 */
export class ApiError extends Error {
  readonly status: number
  readonly payload: unknown
  private readonly _statusObject: Status | undefined

  constructor(status: number, payload: unknown) {
    const parsed = StatusSchema.safeParse(payload)
    const statusObject = parsed.success ? parsed.data : undefined
    super(statusObject?.message ?? `API request failed with status ${status}`)
    this.name = new.target.name
    this.status = status
    this.payload = payload
    this._statusObject = statusObject
  }

  /** Machine-readable reason from the Status payload, e.g. `NotFound`. */
  get reason(): string | undefined {
    return this._statusObject?.reason
  }

  /** Status code reported inside the payload (may differ from `status`). */
  get code(): number | undefined {
    return this._statusObject?.code
  }

  get details(): Record<string, unknown> | undefined {
    return this._statusObject?.details
  }
}

export class ApiClientError extends ApiError {}
export class ApiUnauthorizedError extends ApiClientError {}
export class ApiForbiddenError extends ApiClientError {}
export class ApiNotFoundError extends ApiClientError {}
export class ApiConflictError extends ApiClientError {}
/** The requested resource version is too old; the watcher must re-list. */
export class ApiGoneError extends ApiClientError {}
export class ApiServerError extends ApiError {}

/**
 * Pick the most specific {@link ApiError} class for a status.
 *
 * Statuses outside 4xx and 5xx (including non-standard ones) still produce
 * a plain `ApiError`: only 2xx counts as success.
 */
export function createApiError(status: number, payload: unknown): ApiError {
  switch (status) {
    case 401:
      return new ApiUnauthorizedError(status, payload)
    case 403:
      return new ApiForbiddenError(status, payload)
    case 404:
      return new ApiNotFoundError(status, payload)
    case 409:
      return new ApiConflictError(status, payload)
    case 410:
      return new ApiGoneError(status, payload)
  }
  if (status >= 400 && status < 500) return new ApiClientError(status, payload)
  if (status >= 500 && status < 600) return new ApiServerError(status, payload)
  return new ApiError(status, payload)
}

/** The whole request or stream took longer than its timeout. */
export class RequestTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** A successful response (or a streamed line) is not valid JSON. */
export class ResponseDecodeError extends Error {
  readonly text: string

  constructor(text: string, cause: unknown) {
    super(`Cannot decode response as JSON: ${text.length > 80 ? `${text.slice(0, 80)}…` : text}`, {
      cause,
    })
    this.name = 'ResponseDecodeError'
    this.text = text
  }
}
