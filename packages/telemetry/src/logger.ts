import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Logger, Sink } from '@logtape/logtape'
import type { LoggingConfig } from '@shoal/config'

/** Every component logs under `['shoal', ...]`. */
export const ROOT_CATEGORY = 'shoal'

let configuring: Promise<void> | undefined

function renderMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

/** Errors serialize to `{}` by default; keep their name and message. */
function replaceErrors(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value
}

function hasProperties(record: LogRecord): boolean {
  return Object.keys(record.properties).length > 0
}

/** One JSON object per line on stdout, for log collectors. */
function jsonLinesSink(): Sink {
  return (record) => {
    const entry = {
      timestamp: new Date(record.timestamp).toISOString(),
      level: record.level,
      category: record.category.join('.'),
      message: renderMessage(record),
      ...(hasProperties(record) ? { properties: record.properties } : {}),
    }
    process.stdout.write(`${JSON.stringify(entry, replaceErrors)}\n`)
  }
}

/** `HH:MM:SS.mmm LEVEL category: message` on the console. */
function textSink(): Sink {
  return (record) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const properties = hasProperties(record)
      ? ` ${JSON.stringify(record.properties, replaceErrors)}`
      : ''
    const category = record.category.join('.')
    console.log(`${time} ${level} ${category}: ${renderMessage(record)}${properties}`)
  }
}

/**
 * Route the `shoal` loggers to the sink the environment calls for.
 *
 * Only the first successful call takes effect; a failed one may be retried.
 */
export async function configureLogger(config: LoggingConfig): Promise<void> {
  configuring ??= configure({
    sinks: { main: config.environment === 'production' ? jsonLinesSink() : textSink() },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['main'] },
      { category: [ROOT_CATEGORY], lowestLevel: config.level, sinks: ['main'] },
    ],
  }).catch((err: unknown) => {
    configuring = undefined
    throw err
  })
  return configuring
}

/** Drop the configuration so the next `configureLogger` call applies. For tests. */
export async function resetLogger(): Promise<void> {
  await reset()
  configuring = undefined
}

export { getLogger }
export type { Logger }
