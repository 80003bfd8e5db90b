export { Logger, createSilentLogger, formatLogLine } from "./logger"
export type { LogLevel, LogEntry, LoggerOptions } from "./logger"
