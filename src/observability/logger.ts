// src/observability/logger.ts
// Structured JSON logging for the graph engine
//
// Configures Pino with:
// - Environment-based log levels (LOG_LEVEL, "silent" mutes everything)
// - JSON output by default, pino-pretty when LOG_PRETTY=true
// - Module-scoped child loggers

import pino, { type Logger } from "pino";
import { config } from "../config";

/* ---------- Types ---------- */
export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/* ---------- Configuration ---------- */

/**
 * Resolve the configured log level.
 * Unknown values fall back to 'info'.
 */
export function getLogLevel(): LogLevel {
  const level = config.log.level.toLowerCase();
  return isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(): boolean {
  return config.log.pretty;
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "estate-graph",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger, optionally scoped to a module.
 *
 * @example
 * const log = createLogger('graph/cascade');
 * log.info({ collectionKey: 'units' }, 'Unit created');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/**
 * Child logger with extra bindings attached to every line
 * (e.g. a batch or source document identifier).
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
