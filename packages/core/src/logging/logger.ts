/**
 * Structured Logging
 *
 * Leveled logger with bound context and a pluggable output sink.
 * Non-fatal model conditions (advisory constraint violations, skipped
 * schema documents, import unknowns) are reported through it.
 */

export type LogLevel = "debug" | "info" | "warn"

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  context: Record<string, unknown>
}

export interface LoggerOptions {
  /** Minimum level that reaches the output (default: "warn") */
  level?: LogLevel
  /** Context bound to every entry */
  context?: Record<string, unknown>
  /** Receives every entry at or above the level (default: one console line each) */
  output?: (entry: LogEntry) => void
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
}

export class Logger {
  private readonly level: LogLevel
  private readonly context: Record<string, unknown>
  private readonly output: (entry: LogEntry) => void

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "warn"
    this.context = options.context ?? {}
    this.output = options.output ?? writeConsole
  }

  /** Internal steps: documents skipped, files read, entities created */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context)
  }

  /** Outcomes of whole operations */
  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context)
  }

  /** Data kept or skipped despite a problem the caller should see */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context)
  }

  /**
   * Create a child logger with additional context.
   * The child shares the parent's level and sink.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      output: this.output,
    })
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level]
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return
    this.output({
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    })
  }
}

/**
 * `<timestamp> <LEVEL> <message> {context}`
 */
export function formatLogLine(entry: LogEntry): string {
  let line = `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`
  if (Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`
  }
  return line
}

function writeConsole(entry: LogEntry): void {
  if (entry.level === "warn") console.warn(formatLogLine(entry))
  else console.log(formatLogLine(entry))
}

/**
 * Logger that drops everything. Useful in tests and batch tools.
 */
export function createSilentLogger(): Logger {
  return new Logger({ output: () => {} })
}
