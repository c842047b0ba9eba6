export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /**
   * Defaults to the global console.
   */
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.some((level) => level === value);

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = rank(options.level ?? "info");
  const prefix = options.prefix ?? "[bucket-cache]";
  const sink = options.sink ?? console;

  const emit = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]) => {
    if (rank(level) < threshold) {
      return;
    }
    sink[level](`${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details)
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
