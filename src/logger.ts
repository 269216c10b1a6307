/**
 * Structured logger using pino.
 * JSON output in production, pino-pretty everywhere else.
 */

import pino, { type LevelWithSilent, type Logger as PinoLogger } from "pino";

export type LoggerOptions = {
  level?: LevelWithSilent;
  pretty?: boolean;
};

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
  child: (service: string) => Logger;
}

function wrap(logger: PinoLogger): Logger {
  return {
    debug: (message, extra) => (extra ? logger.debug(extra, message) : logger.debug(message)),
    info: (message, extra) => (extra ? logger.info(extra, message) : logger.info(message)),
    warn: (message, extra) => (extra ? logger.warn(extra, message) : logger.warn(message)),
    error: (message, extra) => (extra ? logger.error(extra, message) : logger.error(message)),
    child: (service) => wrap(logger.child({ service })),
  };
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const baseLogger = pino({
    level: options.level ?? "info",
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  });

  return wrap(baseLogger.child({ service }));
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
