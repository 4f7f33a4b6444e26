/**
 * Leveled logger. One instance is created by the CLI and handed to every
 * component that logs; nothing here touches process-wide state.
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: Date;
  /** Formatted line, coloured when colours are enabled */
  readonly line: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** @default "info" */
  readonly level?: LogLevel;
  /** @default picocolors' own terminal detection */
  readonly colors?: boolean;
  /** @default writes the line to stderr */
  readonly sink?: LogSink;
  readonly now?: () => Date;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABELS: Readonly<Record<LogLevel, string>> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

const stderrSink: LogSink = (entry) => {
  console.error(entry.line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const threshold = LEVEL_RANK[level];
  const colors = pc.createColors(options.colors ?? pc.isColorSupported);
  const sink = options.sink ?? stderrSink;
  const now = options.now ?? (() => new Date());

  const paint: Readonly<Record<LogLevel, (text: string) => string>> = {
    debug: colors.dim,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  function log(entryLevel: LogLevel, message: string): void {
    if (LEVEL_RANK[entryLevel] < threshold) return;
    const timestamp = now();
    const label = paint[entryLevel](LEVEL_LABELS[entryLevel]);
    sink({
      level: entryLevel,
      message,
      timestamp,
      line: `${timestamp.toISOString()} ${label}: ${message}`,
    });
  }

  return {
    level,
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}
