import { setTimeout as sleep } from 'node:timers/promises'
import { ShoalConfigSchema } from '@shoal/config'
import { resetLogger } from '@shoal/telemetry'
import { Hono } from 'hono'
import { afterEach, describe, expect, it } from 'vitest'
import { getUid } from '../src/bodies.js'
import { ResourceMemories } from '../src/inventory.js'
import { runReactor } from '../src/reactor.js'

const config = ShoalConfigSchema.parse({
  client: { server: 'http://kube.test' },
  reactor: { errorDelaysMs: [1] },
  logging: { level: 'fatal', environment: 'test' },
})

describe('runReactor', () => {
  afterEach(async () => {
    await resetLogger()
  })

  it('lists, watches and hands every resource to the handler until stopped', async () => {
    const app = new Hono()
    let watches = 0
    app.get('/api/v1/pods', async (c) => {
      if (c.req.query('watch') !== 'true') {
        return c.json({ metadata: { resourceVersion: '10' }, items: [{ metadata: { uid: 'a' } }] })
      }
      watches += 1
      if (watches > 1) {
        await sleep(50)
        return c.text('')
      }
      return c.text(`${JSON.stringify({ type: 'ADDED', object: { metadata: { uid: 'b' } } })}\n`)
    })

    const stopper = new AbortController()
    const memories = new ResourceMemories()
    const handled: string[] = []

    await runReactor(config, {
      url: '/api/v1/pods',
      memories,
      stopSignal: stopper.signal,
      fetch: async (request) => app.fetch(request),
      handler: ({ type, body }) => {
        handled.push(`${getUid(body)}:${type ?? 'listed'}`)
        if (handled.length === 2) stopper.abort()
      },
    })

    expect(handled).toEqual(['a:listed', 'b:ADDED'])
    expect(memories.size).toBe(2)
  })
})
