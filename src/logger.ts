/**
 * Process logger.
 *
 * Provides a Logger-compatible factory backed by Winston. Components only
 * see the Logger interface, so tests pass a vi.fn() stand-in instead.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && (LOG_LEVELS as readonly string[]).includes(v);
}

export interface MoverLoggerOptions {
  /** Prefix for all log lines. Default: "mover". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
  /** Also append lines to this file (the migration log kept beside the database). */
  file?: string;
}

export function createMoverLogger(opts?: MoverLoggerOptions): Logger {
  const prefix = opts?.prefix ?? "mover";
  const minLevel = opts?.level ?? "info";

  const transports: winston.transport[] = [
    new winston.transports.Console({ forceConsole: true }),
  ];
  if (opts?.file) {
    transports.push(new winston.transports.File({ filename: opts.file }));
  }

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${timestamp} [${prefix}:${level}] ${message}`
      ),
    ),
    transports,
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}
