/**
 * Structured logging: one JSON object per line.
 *
 * `error` lines go to stderr, everything else to stdout, the same split the
 * HTTP layer uses. Child loggers merge their bindings into every line, which
 * is how a run's `runId` ends up on each stage's output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  child(bindings: LogFields): Logger
}

/** Receives each serialized line, newline included. */
export type LogSink = (line: string, level: LogLevel) => void

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export interface LoggerOptions {
  /** Lowest level written. Defaults to `info`. */
  level?: LogLevel
  bindings?: LogFields
  sink?: LogSink
}

export function stdioSink(line: string, level: LogLevel): void {
  if (level === 'error') process.stderr.write(line)
  else process.stdout.write(line)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const bindings = options.bindings ?? {}
  const sink = options.sink ?? stdioSink

  const write = (level: LogLevel, event: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return
    const entry = { ts: new Date().toISOString(), level, event, ...bindings, ...fields }
    sink(JSON.stringify(entry, errorReplacer) + '\n', level)
  }

  return {
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
    child: (extra) => createLogger({ ...options, bindings: { ...bindings, ...extra } }),
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ sink: () => undefined })

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  return value
}
