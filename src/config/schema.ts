import { readFile } from "node:fs/promises";
import { z } from "zod";

/**
 * Logging settings applied by applyLoggingConfig(). The output format is not
 * part of it: LOG_FORMAT is read once when the logger module loads.
 */
export const loggingSchema = z
  .object({
    level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    sanitize: z.boolean().default(true),
    maxArrayLength: z.number().int().positive().default(5),
    maxStringLength: z.number().int().positive().default(500),
    maxDepth: z.number().int().positive().default(3),
  })
  .default({
    level: "info",
    sanitize: true,
    maxArrayLength: 5,
    maxStringLength: 500,
    maxDepth: 3,
  });

export const configSchema = z.object({
  materializer: z
    .object({
      name: z.string().min(1).default("default"),
      awaitTimeoutMs: z.number().int().nonnegative().default(3000),
    })
    .default({ name: "default", awaitTimeoutMs: 3000 }),

  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sectionOf(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = config[key];
  return isRecord(section) ? section : {};
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed)) {
    throw new Error(`expected a JSON object, got ${Array.isArray(parsed) ? "an array" : typeof parsed}`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables
 * 2. Config file specified by path parameter
 * 3. Config file at CONFIG_FILE env var
 * 4. ./config.json
 * 5. Schema defaults
 */
export async function loadConfig(path?: string): Promise<Config> {
  const configPath = path || process.env.CONFIG_FILE || "./config.json";

  let fileConfig: Record<string, unknown>;
  try {
    fileConfig = await readConfigFile(configPath);
  } catch (error) {
    throw new Error(
      `Failed to load configuration: cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  // Only values that are actually set
  const envConfig: Record<string, unknown> = {};

  if (process.env.MATERIALIZER_NAME || process.env.AWAIT_TIMEOUT_MS) {
    envConfig.materializer = {
      ...sectionOf(fileConfig, "materializer"),
      ...(process.env.MATERIALIZER_NAME ? { name: process.env.MATERIALIZER_NAME } : {}),
      ...(process.env.AWAIT_TIMEOUT_MS ? { awaitTimeoutMs: Number.parseInt(process.env.AWAIT_TIMEOUT_MS, 10) } : {}),
    };
  }

  if (
    process.env.LOG_LEVEL ||
    process.env.LOG_SANITIZE ||
    process.env.LOG_MAX_ARRAY_LENGTH ||
    process.env.LOG_MAX_STRING_LENGTH ||
    process.env.LOG_MAX_DEPTH
  ) {
    envConfig.logging = {
      ...sectionOf(fileConfig, "logging"),
      ...(process.env.LOG_LEVEL ? { level: process.env.LOG_LEVEL } : {}),
      ...(process.env.LOG_SANITIZE ? { sanitize: process.env.LOG_SANITIZE !== "false" } : {}),
      ...(process.env.LOG_MAX_ARRAY_LENGTH
        ? { maxArrayLength: Number.parseInt(process.env.LOG_MAX_ARRAY_LENGTH, 10) }
        : {}),
      ...(process.env.LOG_MAX_STRING_LENGTH
        ? { maxStringLength: Number.parseInt(process.env.LOG_MAX_STRING_LENGTH, 10) }
        : {}),
      ...(process.env.LOG_MAX_DEPTH ? { maxDepth: Number.parseInt(process.env.LOG_MAX_DEPTH, 10) } : {}),
    };
  }

  // Env config takes precedence
  const mergedConfig = { ...fileConfig, ...envConfig };

  try {
    return configSchema.parse(mergedConfig);
  } catch (error) {
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}
