import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

export const LOG_LEVELS = ["DEBUG", "INFO", "SKIP", "OK", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const COLORS: Record<LogLevel, string> = {
  DEBUG: "\x1b[2m",
  INFO: "\x1b[0;34m",
  SKIP: "\x1b[0;36m",
  OK: "\x1b[0;32m",
  WARN: "\x1b[1;33m",
  ERROR: "\x1b[0;31m"
};

const RESET = "\x1b[0m";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  skip(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  time: Date;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sinks: LogSink[];
}

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function parseLogLevel(input: string | undefined): LogLevel | undefined {
  const normalized = input?.trim().toUpperCase();
  if (!normalized) {
    return undefined;
  }

  if (normalized === "WARNING") {
    return "WARN";
  }

  return LOG_LEVELS.find((level) => level === normalized);
}

export function formatTimestamp(time: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())} ` +
    `${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`
  );
}

export function formatRecord(record: LogRecord): string {
  return `[${formatTimestamp(record.time)}] [${record.level.padEnd(5)}] ${record.message}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = levelRank(options.level ?? "INFO");

  const emit = (level: LogLevel, message: string) => {
    if (levelRank(level) < threshold) {
      return;
    }

    const record: LogRecord = { level, message, time: new Date() };
    for (const sink of options.sinks) {
      sink(record);
    }
  };

  return {
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    skip: (message) => emit("SKIP", message),
    ok: (message) => emit("OK", message),
    warn: (message) => emit("WARN", message),
    error: (message) => emit("ERROR", message)
  };
}

export function consoleSink(color = Boolean(process.stdout.isTTY)): LogSink {
  return (record) => {
    const line = color
      ? `${COLORS[record.level]}[${record.level.padEnd(5)}]${RESET} ${COLORS.DEBUG}${formatTimestamp(record.time)}${RESET} ${record.message}`
      : formatRecord(record);

    if (record.level === "ERROR") {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * Appends plain lines to `<dir>/<name>_YYYYMMDD.log`. The file name is derived
 * from each record's own date, so a long-running watcher rolls over at midnight.
 */
export function dailyFileSink(dir: string, name: string): LogSink {
  mkdirSync(dir, { recursive: true });

  return (record) => {
    const stamp = formatTimestamp(record.time).slice(0, 10).replace(/-/g, "");
    appendFileSync(join(dir, `${name}_${stamp}.log`), `${formatRecord(record)}\n`, "utf8");
  };
}
