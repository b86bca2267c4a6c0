import { getUid } from './bodies.js'
import type { Body } from './bodies.js'
import { Memo } from './memos.js'
import type { Duplicable } from './memos.js'
import { Throttler } from './throttling.js'

/**
 * Everything kept about one resource between its events. The same instance
 * is handed out for the resource until it is forgotten.
 */
export class ResourceMemory {
  readonly memo: Memo
  readonly throttler = new Throttler()
  /** Handler-local state (timers, daemon handles); opaque to the reactor. */
  readonly state = new Map<string, unknown>()
  /** The resource was first seen in a listing, not in a watch event. */
  noticedByListing: boolean
  private tail: Promise<void> = Promise.resolve()

  constructor(memo: Memo = new Memo(), noticedByListing = false) {
    this.memo = memo
    this.noticedByListing = noticedByListing
  }

  /**
   * Run `task` once every task queued earlier for this resource has
   * settled. Other resources have queues of their own.
   */
  enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task)
    // a failure reaches the caller through `run`; later tasks still run
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

export interface RecallOptions {
  /** Applies only when the memory is created by this call. */
  noticedByListing?: boolean
}

/**
 * Memories of all resources being watched, keyed by `metadata.uid`.
 *
 * Lookup and insertion happen in one synchronous step with no `await`
 * between them, so concurrent recalls of a new resource all get the memory
 * created by the first one.
 */
export class ResourceMemories {
  private readonly memories = new Map<string, ResourceMemory>()

  get size(): number {
    return this.memories.size
  }

  has(body: Body): boolean {
    return this.memories.has(getUid(body))
  }

  /**
   * Get the memory of a resource, creating it on first sight.
   *
   * A new memory gets `memo.duplicate()` of the template, or a fresh
   * {@link Memo} without one. The template is never duplicated for an
   * existing memory.
   */
  async recall(
    body: Body,
    memo?: Duplicable<Memo>,
    options: RecallOptions = {}
  ): Promise<ResourceMemory> {
    const uid = getUid(body)
    let memory = this.memories.get(uid)
    if (memory === undefined) {
      memory = new ResourceMemory(memo?.duplicate(), options.noticedByListing)
      this.memories.set(uid, memory)
    }
    return memory
  }

  /** Drop the memory of a resource. Unknown resources are ignored. */
  async forget(body: Body): Promise<void> {
    this.memories.delete(getUid(body))
  }
}
