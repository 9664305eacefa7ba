export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

export type LogSink = (line: string, ...details: unknown[]) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Logger that prefixes every line with `[scope]`.
 *
 * Writes to stderr by default: stdout is the protocol channel when the
 * server runs over stdio.
 */
export function createLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = console.error
): Logger {
  const threshold = LEVEL_ORDER[level];

  const at =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_ORDER[messageLevel] < threshold) return;
      sink(`[${scope}] ${message}`, ...details);
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export const silentLogger: Logger = createLogger("", "silent");
