/**
 * Shared logger using Winston
 *
 * Supports two modes controlled by APP_MODE environment variable:
 * - Local (default): Colorized, human-readable output
 * - Production (APP_MODE=production): one JSON object per line
 *
 * Log level controlled by LOG_LEVEL environment variable:
 * - debug, info, warn, error, silent (default: info)
 * - "silent" disables all logging (checked at runtime, can be set after import)
 *
 * Usage:
 *   import { createLogger } from "@founder-finder/utils";
 *   const log = createLogger("github-api");
 *   log.info("message", { key: "value" });
 *
 * Local output:
 *   [info] message { "key": "value" }
 *
 * Production output:
 *   {"severity":"info","message":"message","service":"github-api","key":"value"}
 */

import winston from "winston";

const LEVELS = ["error", "warn", "info", "debug"] as const;
type Level = (typeof LEVELS)[number];

function isSilent(): boolean {
  return process.env.LOG_LEVEL?.toLowerCase() === "silent";
}

function isProduction(): boolean {
  return process.env.APP_MODE === "production";
}

function configuredLevel(): Level {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw) ?? "info";
}

/**
 * Drops entries when LOG_LEVEL=silent or when the entry is below LOG_LEVEL.
 * Both are read on every call so tests and scripts can change them after import.
 */
const levelFilter = winston.format((info) => {
  if (isSilent()) return false;
  const entryRank = LEVELS.findIndex((level) => level === info.level);
  const maxRank = LEVELS.indexOf(configuredLevel());
  if (entryRank > maxRank) return false;
  return info;
});

const loggerCache = new Map<string, winston.Logger>();

/**
 * Create a logger instance for a specific service
 *
 * @param service - Service name to include in all log entries
 */
export function createLogger(service: string): winston.Logger {
  const cached = loggerCache.get(service);
  if (cached) return cached;

  const consoleTransport = new winston.transports.Console({
    level: "debug",
    format: winston.format.combine(
      levelFilter(),
      ...(isProduction()
        ? [
            winston.format.printf(({ level, message, ...meta }) => {
              return JSON.stringify({
                severity: level,
                message,
                service,
                ...meta,
              });
            }),
          ]
        : [
            winston.format.colorize(),
            winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
            winston.format.printf(({ level, message, timestamp, ...meta }) => {
              delete meta.service;
              const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
              return `${String(timestamp)} [${level}] ${service}: ${String(message)}${details}`;
            }),
          ])
    ),
  });

  const logger = winston.createLogger({
    level: "debug", // levelFilter decides what gets through
    defaultMeta: { service },
    transports: [consoleTransport],
  });

  loggerCache.set(service, logger);
  return logger;
}

export type { Logger } from "winston";
export default createLogger;
