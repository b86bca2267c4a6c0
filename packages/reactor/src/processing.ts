import type { RawEvent, WatchEventType } from '@shoal/client'
import { getLogger } from '@shoal/telemetry'
import type { Body } from './bodies.js'
import type { ResourceMemories, ResourceMemory } from './inventory.js'
import type { Duplicable, Memo } from './memos.js'
import { throttled } from './throttling.js'

export interface ResourceEvent {
  /** `null` when the resource came from a listing. */
  type: WatchEventType | null
  body: Body
  memory: ResourceMemory
}

export type ResourceHandler = (event: ResourceEvent) => Promise<void> | void

export interface ProcessingOptions {
  memories: ResourceMemories
  handler: ResourceHandler
  /** Template for the memo of newly seen resources. */
  memo?: Duplicable<Memo>
  delaysMs: readonly number[]
  stopSignal?: AbortSignal
}

const logger = getLogger(['shoal', 'reactor', 'processing'])

/**
 * Find the resource's memory and queue the handler on it. `done` settles
 * once the handler has run; `undefined` stands for events that carry no
 * resource.
 *
 * The memory of a deleted resource is forgotten as soon as the deletion
 * arrives; its queued handlers still run against it.
 */
async function dispatch(
  event: RawEvent,
  options: ProcessingOptions
): Promise<{ done: Promise<void> } | undefined> {
  if (event.type === 'BOOKMARK') return undefined

  const { memories, handler, stopSignal } = options
  const { type, object: body } = event
  const memory = await memories.recall(body, options.memo, { noticedByListing: type === null })
  if (type === 'DELETED') {
    await memories.forget(body)
  }

  const done = memory.enqueue(async () => {
    await throttled(memory.throttler, () => handler({ type, body, memory }), {
      delaysMs: options.delaysMs,
      stopSignal,
      logger,
    })
  })
  return { done }
}

/**
 * Handle one raw event: find the resource's memory, run the handler under
 * error throttling, and drop the memory once the resource is deleted.
 */
export async function processResourceEvent(
  event: RawEvent,
  options: ProcessingOptions
): Promise<void> {
  const dispatched = await dispatch(event, options)
  await dispatched?.done
}

/**
 * Handle events until the sequence ends or `stopSignal` is aborted, then
 * wait for the handlers still queued.
 *
 * Events of one resource are handled in arrival order. A resource that is
 * being throttled after a failure delays only its own events.
 *
 * @example
 * ```ts
 * await processResourceEvents(continuousWatch(client, '/api/v1/pods', { stopSignal }), {
 *   memories: new ResourceMemories(),
 *   handler: ({ type, body, memory }) => { ... },
 *   delaysMs: config.reactor.errorDelaysMs,
 *   stopSignal,
 * })
 * ```
 */
export async function processResourceEvents(
  events: AsyncIterable<RawEvent>,
  options: ProcessingOptions
): Promise<void> {
  const pending = new Set<Promise<void>>()
  try {
    for await (const event of events) {
      if (options.stopSignal?.aborted) break
      const dispatched = await dispatch(event, options)
      if (!dispatched) continue
      const handled = dispatched.done
      pending.add(handled)
      // failed handlers stay in `pending` and fail the final wait below
      void handled.then(
        () => pending.delete(handled),
        () => undefined
      )
    }
  } finally {
    await Promise.all(pending)
  }
  logger.debug`Stopped processing; ${options.memories.size} resources remembered`
}
