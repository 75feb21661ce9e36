import { afterEach, expect, test, vi } from "vitest";
import { configSchema } from "../../config/schema";
import { applyLoggingConfig, createLogger } from "./logger";

const stripAnsi = (line: string) => line.replace(/\x1b\[[0-9;]*m/g, "");

const savedLevel = process.env.LOG_LEVEL;

function captureStdout(): string[] {
  const lines: string[] = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
    lines.push(stripAnsi(String(chunk)).trimEnd());
    return true;
  });
  return lines;
}

afterEach(() => {
  vi.restoreAllMocks();
  applyLoggingConfig(configSchema.parse({ logging: { level: "silent" } }).logging);
  if (savedLevel === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = savedLevel;
  }
});

test("a debug level applied from config reaches the line formatter", () => {
  delete process.env.LOG_LEVEL;
  const lines = captureStdout();

  applyLoggingConfig(configSchema.parse({ logging: { level: "debug" } }).logging);
  const log = createLogger("logger-test");
  log.debug({ event: "debug_event" });
  log.trace({ event: "trace_event" });

  expect(lines).toHaveLength(1);
  expect(lines[0]).toMatch(/ DEBUG \[logger-test\] debug_event$/);
});

test("silencing the shared logger also silences existing children", () => {
  applyLoggingConfig(configSchema.parse({ logging: { level: "debug" } }).logging);
  const log = createLogger("logger-test");
  const lines = captureStdout();

  applyLoggingConfig(configSchema.parse({ logging: { level: "silent" } }).logging);
  log.info({ event: "after_silence" });

  expect(lines).toEqual([]);
});
