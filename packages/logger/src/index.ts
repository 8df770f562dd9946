import { appendFileSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface LogContext {
  component?: string
  runId?: string
  phase?: string
  zone?: string
  [key: string]: unknown
}

export interface SerializedError {
  name: string
  message: string
  code?: string
  stack?: string
}

export interface LogEntry {
  level: LogLevel
  message: string
  error?: SerializedError
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, error?: unknown, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void
  /** Same sinks, with `component` and extra context merged into every entry */
  child(component: string, context?: LogContext): Logger
}

export interface LoggerOptions {
  component?: string
  sinks?: LogSink[]
  minLevel?: LogLevel
  context?: LogContext
  clock?: () => Date
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      ...(error.stack ? { stack: error.stack } : {}),
    }
  }
  return { name: "NonError", message: typeof error === "string" ? error : String(error) }
}

/**
 * Human-readable output: `[Component] message`
 */
export function consoleSink(entry: LogEntry): void {
  const prefix = entry.context?.component ? `[${entry.context.component}] ` : ""
  const suffix = entry.error ? `: ${entry.error.message}` : ""
  const line = `${prefix}${entry.message}${suffix}`
  if (entry.level === "error") {
    console.error(line)
  } else if (entry.level === "warn") {
    console.warn(line)
  } else {
    console.log(line)
  }
}

/**
 * Append one JSON object per entry. Used for the per-run deployment log.
 */
export function jsonLinesSink(filePath: string): LogSink {
  let ready = false
  return entry => {
    if (!ready) {
      mkdirSync(dirname(filePath), { recursive: true })
      ready = true
    }
    appendFileSync(filePath, `${JSON.stringify(entry)}\n`, "utf8")
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sinks = options.sinks ?? [consoleSink]
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"]
  const clock = options.clock ?? (() => new Date())
  const baseContext: LogContext = {
    ...options.context,
    ...(options.component ? { component: options.component } : {}),
  }

  const log = (level: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return
    }
    const merged = { ...baseContext, ...context }
    const entry: LogEntry = {
      level,
      message,
      ...(error !== undefined ? { error: serializeError(error) } : {}),
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
      timestamp: clock().toISOString(),
    }
    for (const sink of sinks) {
      sink(entry)
    }
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    child: (component, context) =>
      createLogger({
        ...options,
        sinks,
        component,
        context: { ...baseContext, ...context },
      }),
  }
}
