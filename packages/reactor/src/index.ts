export { MissingIdentityError, getUid } from './bodies.js'
export type { Body } from './bodies.js'
export { Memo } from './memos.js'
export type { Duplicable } from './memos.js'
export { ResourceMemories, ResourceMemory } from './inventory.js'
export type { RecallOptions } from './inventory.js'
export { Throttler, throttled } from './throttling.js'
export type { ThrottleOptions } from './throttling.js'
export { processResourceEvent, processResourceEvents } from './processing.js'
export type { ProcessingOptions, ResourceEvent, ResourceHandler } from './processing.js'
export { runReactor } from './reactor.js'
export type { ReactorOptions } from './reactor.js'
