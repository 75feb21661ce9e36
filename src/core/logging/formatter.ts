/**
 * Line formatters for development logs.
 *
 * - compact: `12:34:56.789 INFO  [materializer] run_started runId=...`
 * - minimal: `34:56.789 run_started runId=...`
 *
 * `pretty` is handled by pino-pretty instead and never reaches this module.
 */

export type LogFormat = "compact" | "minimal";

export interface LogRecord {
  level: number;
  time: number | string;
  msg?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

const ansi = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  reset: "\x1b[0m",
};

const levelLabels: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

// ISO timestamp slice: 11 -> HH:MM:SS.mmm, 14 -> MM:SS.mmm
function clock(time: number | string, from: 11 | 14): string {
  return new Date(time).toISOString().substring(from, 23);
}

function renderValue(value: unknown): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

function renderFields(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${ansi.yellow}${key}${ansi.reset}=${ansi.green}${renderValue(value)}${ansi.reset}`)
    .join(" ");
}

function joinParts(parts: string[]): string {
  return parts.filter((part) => part.length > 0).join(" ");
}

export function formatCompact(record: LogRecord): string {
  const { level, time, msg, component, event, ...fields } = record;
  const label = levelLabels[level] ?? "UNKNOWN";
  const title = event ?? msg;

  return joinParts([
    `${ansi.dim}${clock(time, 11)} ${label.padEnd(5)} [${component ?? "app"}]${ansi.reset}`,
    title ? `${ansi.cyan}${title}${ansi.reset}` : "",
    renderFields(fields),
  ]);
}

export function formatMinimal(record: LogRecord): string {
  const { level: _level, time, msg, component: _component, event, ...fields } = record;
  const title = event ?? msg;

  return joinParts([
    `${ansi.dim}${clock(time, 14)}${ansi.reset}`,
    title ? `${ansi.cyan}${title}${ansi.reset}` : "",
    renderFields(fields),
  ]);
}

export function resolveLogFormat(value: string | undefined): LogFormat | "pretty" {
  return value === "minimal" || value === "pretty" ? value : "compact";
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "time" in value &&
    (typeof value.time === "number" || typeof value.time === "string")
  );
}

/**
 * Pino destination that prints formatted lines to stdout.
 * `minLevel` is read on every write, so level changes made after the stream
 * is created take effect immediately.
 */
export function createFormatterStream(format: LogFormat, minLevel: () => number): { write(chunk: string): void } {
  const formatLine = format === "minimal" ? formatMinimal : formatCompact;

  return {
    write(chunk: string) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        process.stdout.write(chunk);
        return;
      }
      if (!isLogRecord(parsed)) {
        process.stdout.write(chunk);
        return;
      }

      if (parsed.level < minLevel()) return;

      process.stdout.write(`${formatLine(parsed)}\n`);
    },
  };
}
