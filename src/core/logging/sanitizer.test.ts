import { afterEach, describe, expect, test } from "vitest";
import {
  getSanitizeOptionsFromEnv,
  type SanitizeOptions,
  sanitizeForLogging,
  sanitizeRecord,
  truncateArray,
  truncateString,
} from "./sanitizer";

const options: SanitizeOptions = {
  maxArrayLength: 3,
  maxStringLength: 10,
  maxDepth: 3,
  preserveKeys: ["event", "runId"],
};

describe("truncateString", () => {
  test("leaves short strings alone", () => {
    expect(truncateString("abc", 3)).toBe("abc");
  });

  test("cuts long strings and reports the original length", () => {
    expect(truncateString("abcdef", 3)).toBe("abc... [truncated: 6 chars total]");
  });
});

describe("truncateArray", () => {
  test("keeps the first items and counts the rest", () => {
    expect(truncateArray([1, 2, 3, 4, 5, 6, 7], options)).toEqual([1, 2, 3, "... 4 more"]);
  });

  test("returns short arrays unchanged", () => {
    expect(truncateArray([1, 2], options)).toEqual([1, 2]);
  });
});

describe("sanitizeForLogging", () => {
  test("collapses objects beyond maxDepth to their keys", () => {
    expect(sanitizeForLogging({ a: { b: { c: { d: 1, e: 2 } } } }, options)).toEqual({
      a: { b: { c: "[Object: d,e]" } },
    });
  });

  test("collapses nested arrays beyond maxDepth", () => {
    expect(sanitizeForLogging([[[[1]]]], options)).toEqual([[["[Array(1)]"]]]);
  });

  test("serializes errors", () => {
    expect(sanitizeForLogging(new Error("boom"), options)).toMatchObject({ type: "Error", message: "boom" });
  });

  test("serializes dates as ISO strings", () => {
    expect(sanitizeForLogging(new Date("2024-01-01T00:00:00.000Z"), options)).toBe("2024-01-01T00:00:00.000Z");
  });

  test("passes primitives through", () => {
    expect(sanitizeForLogging(42, options)).toBe(42);
    expect(sanitizeForLogging(true, options)).toBe(true);
    expect(sanitizeForLogging(null, options)).toBeNull();
  });
});

describe("sanitizeRecord", () => {
  test("never truncates preserved keys", () => {
    const record = sanitizeRecord({ event: "x".repeat(20), element: "y".repeat(20) }, options);

    expect(record.event).toBe("x".repeat(20));
    expect(record.element).toBe("yyyyyyyyyy... [truncated: 20 chars total]");
  });

  test("counts top-level values as depth one", () => {
    expect(sanitizeRecord({ element: { a: { b: { c: 1 } } } }, options)).toEqual({
      element: { a: { b: "[Object: c]" } },
    });
  });
});

describe("getSanitizeOptionsFromEnv", () => {
  const saved = {
    array: process.env.LOG_MAX_ARRAY_LENGTH,
    depth: process.env.LOG_MAX_DEPTH,
  };

  afterEach(() => {
    for (const [key, value] of [
      ["LOG_MAX_ARRAY_LENGTH", saved.array],
      ["LOG_MAX_DEPTH", saved.depth],
    ] as const) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  test("reads limits and falls back on unparsable values", () => {
    process.env.LOG_MAX_ARRAY_LENGTH = "7";
    process.env.LOG_MAX_DEPTH = "oops";

    const fromEnv = getSanitizeOptionsFromEnv();

    expect(fromEnv.maxArrayLength).toBe(7);
    expect(fromEnv.maxDepth).toBe(3);
  });
});
