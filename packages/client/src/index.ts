export { ApiClient } from './client.js'
export type {
  ApiClientOptions,
  FetchLike,
  HttpMethod,
  ReadOptions,
  RequestOptions,
  StreamOptions,
} from './client.js'
export {
  ApiError,
  ApiClientError,
  ApiConflictError,
  ApiForbiddenError,
  ApiGoneError,
  ApiNotFoundError,
  ApiServerError,
  ApiUnauthorizedError,
  RequestTimeoutError,
  ResponseDecodeError,
  StatusSchema,
  createApiError,
} from './errors.js'
export type { Status } from './errors.js'
export { LineBuffer, parseJson } from './ndjson.js'
export type { LineBufferState } from './ndjson.js'
export {
  WatchEventSchema,
  WatchEventTypeSchema,
  buildWatchUrl,
  continuousWatch,
  getResourceVersion,
  listObjects,
  watchObjects,
} from './watching.js'
export type {
  ObjectListing,
  RawEvent,
  ResourceObject,
  WatchEvent,
  WatchEventType,
  WatchOptions,
} from './watching.js'
