/**
 * @concordance/logger
 *
 * One entry per call, either a JSON line or a colored line for terminals.
 * Child loggers extend the component path ("reconciler:pipeline") and stamp
 * their default context on every entry. A sink receives each entry that
 * clears the level filter; by default it is the console.
 *
 * LOG_LEVEL picks the minimum level (info when unset). LOG_FORMAT picks json
 * or pretty; without it, production runs get json.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  [key: string]: unknown
}

/**
 * Receives every entry that passes the level filter.
 * The default sink writes to the console.
 */
export type LogSink = (entry: LogEntry, formatted: string) => void

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  sink?: LogSink
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function formatFromEnv(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  // Default: pretty in development, json in production
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry, color = true): string {
  const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text)
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level, service, component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${paint(DIM, JSON.stringify(meta))}` : ''
  const errorStr = error ? `\n  ${paint(DIM, error.stack || error.message)}` : ''

  return `${paint(DIM, timestamp)} ${paint(LOG_COLORS[level] + BRIGHT, levelStr)} ${paint(DIM, `[${componentPath}]`)} ${message}${metaStr}${errorStr}`
}

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  fatal: (line) => console.error(line),
}

const consoleSink: LogSink = (entry, formatted) => CONSOLE_METHODS[entry.level](formatted)

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger
   * @param component - Component name appended to the parent's path
   * @param defaultContext - Fields stamped on every entry of the child
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: LoggerOptions

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = options
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minimum = this.options.level ?? levelFromEnv()
    if (LOG_LEVELS[level] < LOG_LEVELS[minimum]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    const format = this.options.format ?? formatFromEnv()
    const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)
    const sink = this.options.sink ?? consoleSink
    sink(entry, formatted)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const nextComponent = this.component ? `${this.component}:${component}` : component
    return new Logger(
      this.service,
      nextComponent,
      { ...this.defaultContext, ...defaultContext },
      this.options
    )
  }
}

/**
 * Root logger for a service. Components hang off it through `child`:
 *
 * ```ts
 * const log = createLogger('reconciler').child('pipeline', { datasetId: 'olympics' })
 * log.warn('Unresolved names need curator review', { count: 2 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/** Drops every entry; the default where callers pass no logger */
export const silentLogger: ILogger = createLogger('silent', { sink: () => undefined })
