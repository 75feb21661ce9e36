import pino from "pino";
import type { LoggingConfig } from "../../config/schema";
import { createFormatterStream, resolveLogFormat } from "./formatter";
import { configureSanitizer, getSanitizeOptionsFromEnv, sanitizeRecord } from "./sanitizer";

/**
 * Structured logging with Pino.
 *
 * - JSON output in production
 * - Compact or minimal line formats for development (LOG_FORMAT, read once at load)
 * - pino-pretty when LOG_FORMAT=pretty
 * - Element payloads are truncated by the sanitizer before they are written
 */

const isDev = process.env.NODE_ENV !== "production";
const logFormat = resolveLogFormat(process.env.LOG_FORMAT);
let sanitizeEnabled = process.env.LOG_SANITIZE !== "false";
configureSanitizer(getSanitizeOptionsFromEnv());

const baseConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  // Service metadata only in production JSON logs
  base: isDev
    ? null
    : {
        service: "blueprint-streams",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },

  formatters: {
    log(obj: Record<string, unknown>) {
      return sanitizeEnabled ? sanitizeRecord(obj) : obj;
    },
  },
};

const baseLogger: pino.Logger = isDev
  ? logFormat === "pretty"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      })
    : pino(
        baseConfig,
        createFormatterStream(logFormat, () => baseLogger.levelVal),
      )
  : pino(baseConfig);

export interface LogContext {
  materializer?: string;
  runId?: string;
  [key: string]: unknown;
}

export type Logger = pino.Logger;

export function createLogger(component: string, context?: LogContext): Logger {
  return baseLogger.child({
    component,
    ...context,
  });
}

/**
 * Apply the logging section of a loaded config to the shared logger.
 * Loggers created afterwards inherit the new level.
 */
export function applyLoggingConfig(config: LoggingConfig): void {
  baseLogger.level = config.level;
  sanitizeEnabled = config.sanitize;
  configureSanitizer({
    maxArrayLength: config.maxArrayLength,
    maxStringLength: config.maxStringLength,
    maxDepth: config.maxDepth,
  });
}

export { baseLogger as logger };
