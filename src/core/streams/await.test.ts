import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, test } from "vitest";
import { awaitResult } from "./await";
import { WaitTimedOutError } from "./errors";

describe("awaitResult", () => {
  test("resolves with the value when it arrives in time", async () => {
    expect(await awaitResult(Promise.resolve(55), 100)).toBe(55);
  });

  test("rejects with WaitTimedOutError when the value is late", async () => {
    const late = sleep(200).then(() => "late");

    await expect(awaitResult(late, 10)).rejects.toThrow(WaitTimedOutError);
    await expect(awaitResult(late, 10)).rejects.toThrow("Timed out after 10ms waiting for materialized value");
  });

  test("passes through rejections", async () => {
    await expect(awaitResult(Promise.reject(new Error("boom")), 100)).rejects.toThrow("boom");
  });

  test("rejects negative timeouts", async () => {
    await expect(awaitResult(Promise.resolve(1), -1)).rejects.toThrow(RangeError);
  });
});
