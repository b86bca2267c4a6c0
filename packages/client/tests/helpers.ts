import { Hono } from 'hono'
import { ApiClient } from '../src/client.js'
import type { ApiClientOptions } from '../src/client.js'

export const SERVER = 'http://kube.test'

export interface ReceivedRequest {
  method: string
  url: string
  path: string
  body: string
  headers: Record<string, string>
}

/**
 * An in-process peer: requests go straight to a Hono app, no sockets.
 * Every request the app sees is recorded before the route runs.
 */
export function createPeer(options: Omit<ApiClientOptions, 'server' | 'fetch'> = {}) {
  const app = new Hono()
  const received: ReceivedRequest[] = []

  app.use('*', async (c, next) => {
    received.push({
      method: c.req.method,
      url: c.req.url,
      path: c.req.path,
      body: await c.req.raw.clone().text(),
      headers: c.req.header(),
    })
    await next()
  })

  const client = new ApiClient({
    server: SERVER,
    fetch: async (request) => app.fetch(request),
    ...options,
  })
  return { app, client, received }
}

export function ndjson(...records: unknown[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('')
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) {
    items.push(item)
  }
  return items
}

/** Await a promise that must reject with `errorClass`, and return the error. */
export async function rejection<E extends Error>(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => E
): Promise<E> {
  const outcome = await promise.then(
    () => undefined,
    (err: unknown) => err
  )
  if (!(outcome instanceof errorClass)) {
    throw new Error(`Expected a ${errorClass.name}, got ${String(outcome)}`)
  }
  return outcome
}
