/**
 * Leveled logging on top of the console.
 *
 * Levels follow syslog ordering; anything below the configured threshold is dropped.
 */

export const LOG_LEVELS = ["fatal", "error", "warn", "notice", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface Logger {
  readonly level: LogLevel;
  fatal(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  notice(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  tag?: string;
  sink?: LogSink;
}

const RANK: Record<LogLevel, number> = { fatal: 0, error: 1, warn: 2, notice: 3, info: 4, debug: 5 };

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const tag = options.tag ?? "frost-httpd";
  const sink = options.sink ?? console;

  const emit = (at: LogLevel, message: string) => {
    if (RANK[at] > RANK[level]) return;
    const line = `${tag}[${process.pid}] ${at.toUpperCase()}: ${message}`;
    switch (at) {
      case "fatal":
      case "error":
        sink.error(line);
        break;
      case "warn":
        sink.warn(line);
        break;
      case "debug":
        sink.debug(line);
        break;
      default:
        sink.log(line);
    }
  };

  return {
    level,
    fatal: (message) => emit("fatal", message),
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    notice: (message) => emit("notice", message),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
  };
}
