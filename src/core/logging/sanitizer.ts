/**
 * Log sanitization: keeps element payloads from flooding the logs.
 *
 * - Long strings are cut with a character count
 * - Long arrays keep their first items plus a "more" marker
 * - Objects deeper than maxDepth collapse to their key list
 *
 * Set LOG_SANITIZE=false to log payloads untouched.
 */

export interface SanitizeOptions {
  /** Maximum number of array items to show */
  maxArrayLength: number;
  /** Maximum string length before truncation */
  maxStringLength: number;
  /** Maximum object depth before showing keys only */
  maxDepth: number;
  /** Top-level keys that are never truncated */
  preserveKeys: string[];
}

export const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = {
  maxArrayLength: 5,
  maxStringLength: 500,
  maxDepth: 3,
  preserveKeys: ["event", "component", "materializer", "runId", "stage"],
};

let activeOptions: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS;

export function truncateString(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}... [truncated: ${value.length} chars total]`;
}

export function truncateArray(values: unknown[], options: SanitizeOptions, depth = 0): unknown[] {
  const shown = values.slice(0, options.maxArrayLength).map((item) => sanitizeForLogging(item, options, depth + 1));
  const hidden = values.length - shown.length;
  return hidden > 0 ? [...shown, `... ${hidden} more`] : shown;
}

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(value: unknown, options: SanitizeOptions = activeOptions, depth = 0): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return truncateString(value, options.maxStringLength);
  if (typeof value !== "object") {
    return typeof value === "function" || typeof value === "symbol" ? String(value) : value;
  }

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      type: value.name,
      message: truncateString(value.message, options.maxStringLength),
      ...(value.stack && { stack: truncateString(value.stack, options.maxStringLength) }),
    };
  }

  if (Array.isArray(value)) {
    if (depth >= options.maxDepth) return `[Array(${value.length})]`;
    return truncateArray(value, options, depth);
  }

  const entries = Object.entries(value);
  if (depth >= options.maxDepth) {
    return `[Object: ${entries.map(([key]) => key).join(",")}]`;
  }
  return Object.fromEntries(entries.map(([key, item]) => [key, sanitizeForLogging(item, options, depth + 1)]));
}

/**
 * Sanitize a top-level log record, leaving preserved keys as they are.
 */
export function sanitizeRecord(
  record: Record<string, unknown>,
  options: SanitizeOptions = activeOptions,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = options.preserveKeys.includes(key) ? value : sanitizeForLogging(value, options, 1);
  }
  return result;
}

export function configureSanitizer(options: Partial<SanitizeOptions>): void {
  activeOptions = { ...activeOptions, ...options };
}

export function getSanitizeOptions(): SanitizeOptions {
  return activeOptions;
}

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getSanitizeOptionsFromEnv(): SanitizeOptions {
  return {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: readIntEnv("LOG_MAX_ARRAY_LENGTH", DEFAULT_SANITIZE_OPTIONS.maxArrayLength),
    maxStringLength: readIntEnv("LOG_MAX_STRING_LENGTH", DEFAULT_SANITIZE_OPTIONS.maxStringLength),
    maxDepth: readIntEnv("LOG_MAX_DEPTH", DEFAULT_SANITIZE_OPTIONS.maxDepth),
  };
}
