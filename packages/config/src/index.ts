import { z } from 'zod'

export const DEFAULT_USER_AGENT = 'shoal/0.1.0'

/**
 * Backoff sequence for per-resource error throttling, in milliseconds.
 * The last delay repeats once the sequence is exhausted.
 */
export const DEFAULT_ERROR_DELAYS_MS = [
  1_000, 1_000, 2_000, 3_000, 5_000, 8_000, 13_000, 21_000, 34_000, 55_000, 89_000, 144_000,
  233_000, 377_000, 610_000,
]

const TimeoutMsSchema = z.number().int().positive()

/**
 * API client configuration.
 *
 * `server` is the base for relative request URLs. Trailing slashes are
 * stripped so that `server + '/path'` never yields a doubled slash.
 */
export const ClientConfigSchema = z.object({
  server: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  requestTimeoutMs: TimeoutMsSchema.optional(),
  watchTimeoutSeconds: z.number().int().positive().optional(),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
})

export type ClientConfig = z.infer<typeof ClientConfigSchema>

/**
 * Reactor (event-processing) configuration.
 */
export const ReactorConfigSchema = z.object({
  errorDelaysMs: z.array(z.number().nonnegative()).min(1).default(DEFAULT_ERROR_DELAYS_MS),
})

export type ReactorConfig = z.infer<typeof ReactorConfigSchema>

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'fatal'])
export type LogLevel = z.infer<typeof LogLevelSchema>

export const EnvironmentSchema = z.enum(['development', 'production', 'test'])
export type Environment = z.infer<typeof EnvironmentSchema>

/**
 * Logging configuration. `production` writes JSON lines; every other
 * environment writes readable text.
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  environment: EnvironmentSchema.default('development'),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Top-level configuration
 */
export const ShoalConfigSchema = z.object({
  client: ClientConfigSchema,
  reactor: ReactorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type ShoalConfig = z.infer<typeof ShoalConfigSchema>

function parseNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined
}

/**
 * Loads the default configuration from environment variables.
 *
 * `SHOAL_SERVER` is required. Everything else falls back to the schema
 * defaults. Logging follows `LOG_LEVEL` and `NODE_ENV`. Values are
 * validated by {@link ShoalConfigSchema}; a ZodError is thrown for
 * malformed input.
 */
export function loadDefaultConfig(): ShoalConfig {
  const server = process.env.SHOAL_SERVER
  if (!server) {
    throw new Error('SHOAL_SERVER environment variable is required')
  }

  const errorDelays = process.env.SHOAL_ERROR_DELAYS_MS
  return ShoalConfigSchema.parse({
    client: {
      server,
      requestTimeoutMs: parseNumber(process.env.SHOAL_REQUEST_TIMEOUT_MS),
      watchTimeoutSeconds: parseNumber(process.env.SHOAL_WATCH_TIMEOUT_SECONDS),
      userAgent: process.env.SHOAL_USER_AGENT || undefined,
    },
    reactor: {
      errorDelaysMs: errorDelays ? (JSON.parse(errorDelays) as unknown) : undefined,
    },
    logging: {
      level: process.env.LOG_LEVEL || undefined,
      environment: process.env.NODE_ENV || undefined,
    },
  })
}
