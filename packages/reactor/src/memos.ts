/** A value that can produce an independent copy of itself. */
export interface Duplicable<T> {
  duplicate(): T
}

/**
 * Free-form per-resource memory kept by handlers between events.
 *
 * `duplicate()` is a shallow copy: own fields are copied, nested objects are
 * shared. Subclasses with extra structure override it and return their own
 * type.
 *
 * @example
 * ```ts
 * const template = new Memo()
 * template.greeting = 'hello'
 * await memories.recall(body, template) // memo.greeting === 'hello'
 * ```
 */
export class Memo implements Duplicable<Memo> {
  [key: string]: unknown

  duplicate(): Memo {
    return Object.assign(new Memo(), this)
  }
}
