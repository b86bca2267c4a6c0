import { getLogger } from '@shoal/telemetry'
import { z } from 'zod'
import type { ApiClient, ReadOptions } from './client.js'
import { ApiGoneError, StatusSchema, createApiError } from './errors.js'

export const WatchEventTypeSchema = z.enum(['ADDED', 'MODIFIED', 'DELETED', 'BOOKMARK', 'ERROR'])
export type WatchEventType = z.infer<typeof WatchEventTypeSchema>

const ResourceObjectSchema = z.record(z.string(), z.unknown())
export type ResourceObject = z.infer<typeof ResourceObjectSchema>

export const WatchEventSchema = z.object({
  type: WatchEventTypeSchema,
  object: ResourceObjectSchema,
})
export type WatchEvent = z.infer<typeof WatchEventSchema>

/**
 * An event as the reactor sees it. `type` is `null` for objects that came
 * from the initial listing rather than from a watch stream.
 */
export interface RawEvent {
  type: WatchEventType | null
  object: ResourceObject
}

export const ObjectListSchema = z.object({
  metadata: z
    .object({ resourceVersion: z.string().optional() })
    .passthrough()
    .default({}),
  items: z.array(ResourceObjectSchema),
})

const VersionedSchema = z.object({
  metadata: z.object({ resourceVersion: z.string() }).passthrough(),
})

export interface ObjectListing {
  items: ResourceObject[]
  resourceVersion: string | undefined
}

export interface WatchOptions {
  /** Start after this version. Omitted means "from now". */
  resourceVersion?: string
  stopSignal?: AbortSignal
  timeoutMs?: number
}

const logger = getLogger(['shoal', 'client', 'watching'])

export function getResourceVersion(object: ResourceObject): string | undefined {
  const parsed = VersionedSchema.safeParse(object)
  return parsed.success ? parsed.data.metadata.resourceVersion : undefined
}

/** GET a collection and return its items with the list's resource version. */
export async function listObjects(
  client: ApiClient,
  url: string,
  options?: ReadOptions
): Promise<ObjectListing> {
  const list = ObjectListSchema.parse(await client.get(url, options))
  return { items: list.items, resourceVersion: list.metadata.resourceVersion }
}

/**
 * Add the watch query parameters to a collection URL, keeping any query
 * the caller already put there (label selectors and the like).
 */
export function buildWatchUrl(client: ApiClient, url: string, resourceVersion?: string): string {
  const queryAt = url.indexOf('?')
  const path = queryAt === -1 ? url : url.slice(0, queryAt)
  const params = new URLSearchParams(queryAt === -1 ? '' : url.slice(queryAt + 1))
  params.set('watch', 'true')
  params.set('allowWatchBookmarks', 'true')
  if (resourceVersion !== undefined) {
    params.set('resourceVersion', resourceVersion)
  }
  if (client.watchTimeoutSeconds !== undefined) {
    params.set('timeoutSeconds', String(client.watchTimeoutSeconds))
  }
  return `${path}?${params.toString()}`
}

/**
 * Stream the watch events of a collection once, until the server closes
 * the stream or `stopSignal` is aborted.
 *
 * An `ERROR` event is raised as the matching {@link ApiError}; an expired
 * resource version therefore surfaces as {@link ApiGoneError}.
 */
export async function* watchObjects(
  client: ApiClient,
  url: string,
  options: WatchOptions = {}
): AsyncGenerator<WatchEvent, void, undefined> {
  const watchUrl = buildWatchUrl(client, url, options.resourceVersion)
  const records = client.stream(watchUrl, {
    stopSignal: options.stopSignal,
    timeoutMs: options.timeoutMs,
  })
  for await (const record of records) {
    const event = WatchEventSchema.parse(record)
    if (event.type === 'ERROR') {
      const status = StatusSchema.safeParse(event.object)
      const code = status.success ? status.data.code : undefined
      throw createApiError(code ?? 500, event.object)
    }
    yield event
  }
}

/**
 * List, then watch from the list's version, indefinitely.
 *
 * Listed objects are yielded with `type: null`. When a watch stream ends,
 * watching resumes from the last version seen. When the version is gone,
 * the collection is listed again. Bookmarks only advance the version.
 * Ends when `stopSignal` is aborted; any other error propagates.
 */
export async function* continuousWatch(
  client: ApiClient,
  url: string,
  options: Pick<WatchOptions, 'stopSignal'> = {}
): AsyncGenerator<RawEvent, void, undefined> {
  const { stopSignal } = options

  while (!stopSignal?.aborted) {
    const listing = await listObjects(client, url)
    for (const object of listing.items) {
      yield { type: null, object }
    }

    let resourceVersion = listing.resourceVersion
    try {
      while (!stopSignal?.aborted) {
        for await (const event of watchObjects(client, url, { resourceVersion, stopSignal })) {
          resourceVersion = getResourceVersion(event.object) ?? resourceVersion
          if (event.type === 'BOOKMARK') continue
          yield event
        }
      }
    } catch (err) {
      if (!(err instanceof ApiGoneError)) throw err
      logger.info`Version ${resourceVersion} of ${url} is gone; listing again`
    }
  }
}
