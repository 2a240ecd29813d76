export type { FileLoggerOptions, LogEntry, LogLevel, Logger } from "./logger";
export {
  DEFAULT_LOG_FILE,
  MemoryLogger,
  createFileLogger,
  formatLogLine,
  formatLogTimestamp,
} from "./logger";
