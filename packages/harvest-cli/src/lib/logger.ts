export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/** Receives one formatted line per log call */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Where lines go; defaults to stdout for debug/info and stderr otherwise */
  write?: LogWriter;
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Severity order, lowest first */
const SEVERITY: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const consoleWriter: LogWriter = (level, line) => {
  const stream = level === "warn" || level === "error" ? console.error : console.log;
  stream(line);
};

/**
 * Every level on stderr, so stdout carries nothing but NDJSON records.
 */
export const stderrWriter: LogWriter = (_level, line) => {
  console.error(line);
};

/**
 * One log line: a JSON object, or `I: [timestamp] message {"meta":1}`.
 */
export function formatLogLine(
  level: LogLevel,
  timestamp: string,
  message: string,
  meta: LogMeta,
  json: boolean
): string {
  if (json) {
    return JSON.stringify({ timestamp, level, message, ...meta });
  }
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${level.charAt(0).toUpperCase()}: [${timestamp}] ${message}${suffix}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY.indexOf(options.level);
  const write = options.write ?? consoleWriter;
  const now = options.now ?? (() => new Date());

  const at =
    (level: LogLevel) =>
    (message: string, meta: LogMeta = {}): void => {
      if (SEVERITY.indexOf(level) < threshold) return;
      write(level, formatLogLine(level, now().toISOString(), message, meta, options.json));
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}
