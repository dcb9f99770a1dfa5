export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Defaults to the global console */
  readonly sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/**
 * Console logger that prefixes every line with `[tag]`.
 */
export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;
  const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= threshold;

  return {
    debug: (message) => {
      if (enabled("debug")) sink.debug(`[${tag}] ${message}`);
    },
    info: (message) => {
      if (enabled("info")) sink.info(`[${tag}] ${message}`);
    },
    warn: (message) => {
      if (enabled("warn")) sink.warn(`[${tag}] ${message}`);
    },
    error: (message) => {
      if (enabled("error")) sink.error(`[${tag}] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** `abcd…wxyz`; short keys are hidden entirely. */
export function maskKey(key: string): string {
  if (key.length <= 8) return "****";
  return `${key.slice(0, 4)}…${key.slice(-4)}`;
}
