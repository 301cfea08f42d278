import pino from "pino";

export type LogData = Record<string, unknown>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export interface LoggerConfig {
  level?: string;
  silent?: boolean;
}

const LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

function resolveLevel(level: string | undefined): string {
  const normalized = level?.trim().toLowerCase();
  const match = LEVELS.find((entry) => entry === normalized);
  return match ?? "info";
}

/**
 * Structured logger on stderr; stdout is reserved for command results.
 */
export function createLogger(service: string, config: LoggerConfig = {}): Logger {
  const base = pino(
    {
      level: config.silent ? "silent" : resolveLevel(config.level),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
  const child = base.child({ service });

  return {
    debug: (message, data) => (data ? child.debug(data, message) : child.debug(message)),
    info: (message, data) => (data ? child.info(data, message) : child.info(message)),
    warn: (message, data) => (data ? child.warn(data, message) : child.warn(message)),
    error: (message, data) => (data ? child.error(data, message) : child.error(message)),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
