import { ApiClient, continuousWatch } from '@shoal/client'
import type { FetchLike } from '@shoal/client'
import type { ShoalConfig } from '@shoal/config'
import { configureLogger, getLogger } from '@shoal/telemetry'
import { ResourceMemories } from './inventory.js'
import type { Duplicable, Memo } from './memos.js'
import { processResourceEvents } from './processing.js'
import type { ResourceHandler } from './processing.js'

export interface ReactorOptions {
  /** Collection to watch, e.g. `/api/v1/pods`. */
  url: string
  handler: ResourceHandler
  memo?: Duplicable<Memo>
  stopSignal?: AbortSignal
  /** Defaults to a fresh registry. */
  memories?: ResourceMemories
  fetch?: FetchLike
}

const logger = getLogger(['shoal', 'reactor'])

/**
 * Watch one collection and hand its events to `handler` until stopped.
 *
 * @example
 * ```ts
 * const config = loadDefaultConfig()
 * await runReactor(config, {
 *   url: '/apis/example.com/v1/widgets',
 *   handler: async ({ type, body, memory }) => { ... },
 *   stopSignal: AbortSignal.timeout(60_000),
 * })
 * ```
 */
export async function runReactor(config: ShoalConfig, options: ReactorOptions): Promise<void> {
  await configureLogger(config.logging)

  const client = ApiClient.fromConfig(config.client, options.fetch)
  const { stopSignal } = options
  logger.info`Watching ${options.url} on ${client.server}`

  await processResourceEvents(continuousWatch(client, options.url, { stopSignal }), {
    memories: options.memories ?? new ResourceMemories(),
    handler: options.handler,
    memo: options.memo,
    delaysMs: config.reactor.errorDelaysMs,
    stopSignal,
  })
  logger.info`Stopped watching ${options.url}`
}
