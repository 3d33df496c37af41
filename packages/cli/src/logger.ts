/**
 * Leveled logger writing through @clack/prompts
 */

import * as p from "@clack/prompts";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
};

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LEVELS, value);

const formatError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Create a logger; messages below `level` are dropped
 */
export const createLogger = (level: LogLevel = "info"): Logger => {
  const enabled = (candidate: LogLevel) => LEVELS[candidate] >= LEVELS[level];

  return {
    debug: (message) => {
      if (enabled("debug")) p.log.message(message, { symbol: "·" });
    },
    info: (message) => {
      if (enabled("info")) p.log.info(message);
    },
    warn: (message) => {
      if (enabled("warn")) p.log.warn(message);
    },
    error: (message, error) => {
      if (!enabled("error")) return;
      p.log.error(error === undefined ? message : `${message}: ${formatError(error)}`);
    },
  };
};

/** Logger that drops everything (tests, library embedding) */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const envLevel = process.env["SESSION_SYNC_LOG_LEVEL"];

/** Process-wide logger, threshold from SESSION_SYNC_LOG_LEVEL */
export const logger = createLogger(isLogLevel(envLevel) ? envLevel : "info");
