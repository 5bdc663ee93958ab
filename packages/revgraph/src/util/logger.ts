/**
 * Logging
 *
 * Per-graph structured logger. Levels filter output; a custom handler
 * replaces console output (for tests or a host application's own sink).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export interface LogContext {
  [key: string]: unknown
}

export type LogHandler = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => void

export interface LoggerConfig {
  /** Minimum level to output (defaults to silent) */
  level?: LogLevel
  /** Component name added to every context */
  component?: string
  /** Receives entries instead of the console */
  handler?: LogHandler
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  let formatted = `[${level.toUpperCase()}] ${message}`
  if (context && Object.keys(context).length > 0) {
    formatted += ` ${JSON.stringify(context)}`
  }
  return formatted
}

function writeToConsole(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
  const formatted = formatMessage(level, message, context)
  switch (level) {
    case "debug":
      console.debug(formatted)
      break
    case "info":
      console.info(formatted)
      break
    case "warn":
      console.warn(formatted)
      break
    case "error":
      console.error(formatted)
      break
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const threshold = LOG_LEVEL_PRIORITY[config.level ?? "silent"]
  const handler = config.handler ?? writeToConsole
  const component = config.component

  const log = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_PRIORITY[level] < threshold) return
    handler(level, message, component ? { component, ...context } : context)
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  }
}
