import { appendFileSync, mkdirSync } from "node:fs"
import path from "node:path"

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

export interface LogEntry {
  readonly level: LogLevel
  readonly message: string
  readonly context: LogContext
}

export type LogSink = (line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export const parseLogLevel = (value: string | undefined, fallback: LogLevel = "info"): LogLevel => {
  const normalized = value?.trim().toLowerCase()
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized
  }
  return fallback
}

const CIRCULAR = "[Circular]"

const jsonSafe = (value: unknown): unknown => {
  try {
    JSON.stringify(value)
    return value
  } catch {
    return String(value)
  }
}

// Cause chains may loop back on themselves; each error is written once.
const serializeValue = (value: unknown, seen: WeakSet<Error>): unknown => {
  if (value instanceof Error) {
    if (seen.has(value)) return CIRCULAR
    seen.add(value)
    const cause: unknown = value.cause
    return {
      name: value.name,
      message: value.message,
      ...(cause !== undefined ? { cause: serializeValue(cause, seen) } : {}),
    }
  }
  return jsonSafe(value)
}

const formatLine = (level: LogLevel, message: string, context: LogContext, now: () => Date): string => {
  const fields: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context)) {
    fields[key] = serializeValue(value, new WeakSet())
  }
  return JSON.stringify({ level, message, ...fields, ts: now().toISOString() })
}

export interface LoggerOptions {
  readonly level?: LogLevel
  readonly sink: LogSink
  readonly now?: () => Date
}

export const createLogger = (options: LoggerOptions): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? "info"]
  const now = options.now ?? (() => new Date())
  const write = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (LEVEL_ORDER[level] < threshold) return
    options.sink(formatLine(level, message, context, now))
  }
  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  }
}

// Appends synchronously so lines survive a crash of the ink renderer.
export const fileSink = (filePath: string): LogSink => {
  mkdirSync(path.dirname(filePath), { recursive: true })
  return (line) => {
    try {
      appendFileSync(filePath, `${line}\n`, "utf8")
    } catch (error) {
      if (process.env.CARL_LOG_DEBUG === "1") {
        console.error(JSON.stringify({ logSinkError: String(error), filePath }))
      }
    }
  }
}

export interface MemoryLogger extends Logger {
  readonly entries: ReadonlyArray<LogEntry>
}

export const createMemoryLogger = (): MemoryLogger => {
  const entries: LogEntry[] = []
  const record = (level: LogLevel) => (message: string, context: LogContext = {}) => {
    entries.push({ level, message, context })
  }
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
