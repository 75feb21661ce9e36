export * from "./core/streams";
export { type Config, configSchema, type LoggingConfig, loadConfig } from "./config/schema";
export { applyLoggingConfig, createLogger, type Logger, logger } from "./core/logging/logger";
