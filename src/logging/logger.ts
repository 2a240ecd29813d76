import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import path from "node:path";

import { InternalError } from "../errors";

export const DEFAULT_LOG_FILE = path.join("logs", "endpoint_monitor.log");

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Flushes pending lines and releases the underlying handle. */
  close(): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLogTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogLine(entry: LogEntry): string {
  return `${formatLogTimestamp(entry.timestamp)} ${entry.level.padEnd(8)} ${entry.message}`;
}

abstract class BaseLogger implements Logger {
  protected constructor(private readonly clock: () => Date) {}

  info(message: string): void {
    this.write({ level: "INFO", message, timestamp: this.clock() });
  }

  warn(message: string): void {
    this.write({ level: "WARNING", message, timestamp: this.clock() });
  }

  error(message: string): void {
    this.write({ level: "ERROR", message, timestamp: this.clock() });
  }

  abstract close(): Promise<void>;

  protected abstract write(entry: LogEntry): void;
}

export interface FileLoggerOptions {
  /** Defaults to `logs/endpoint_monitor.log` relative to the working directory. */
  path?: string;
  clock?: () => Date;
  /** Receives write failures of the log file. Defaults to stderr. */
  onError?: (error: Error) => void;
}

class FileLogger extends BaseLogger {
  private closed = false;

  constructor(
    private readonly stream: WriteStream,
    clock: () => Date,
  ) {
    super(clock);
  }

  protected write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    this.stream.write(`${formatLogLine(entry)}\n`);
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    this.closed = true;

    return new Promise<void>((resolve) => {
      this.stream.end(() => {
        resolve();
      });
    });
  }
}

/**
 * Opens the append-only log file, creating its directory when missing.
 * Throws InternalError when the directory cannot be created.
 */
export function createFileLogger(options: FileLoggerOptions = {}): Logger {
  const filePath = options.path ?? DEFAULT_LOG_FILE;
  const onError =
    options.onError ??
    ((error: Error) => {
      process.stderr.write(`Unable to write log file ${filePath}: ${error.message}\n`);
    });

  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InternalError(`Unable to create log directory: ${message}`, {
      context: { path: filePath },
      cause: error,
    });
  }

  const stream = createWriteStream(filePath, { flags: "a", encoding: "utf8" });
  stream.on("error", onError);

  return new FileLogger(stream, options.clock ?? (() => new Date()));
}

export class MemoryLogger extends BaseLogger {
  readonly entries: LogEntry[] = [];

  constructor(clock: () => Date = () => new Date()) {
    super(clock);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  protected write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}
