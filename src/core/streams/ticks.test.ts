import { describe, expect, test } from "vitest";
import { delay, TimerCancellable, ticks } from "./ticks";

describe("TimerCancellable", () => {
  test("cancels once", () => {
    const cancellable = new TimerCancellable();

    expect(cancellable.isCancelled()).toBe(false);
    expect(cancellable.cancel()).toBe(true);
    expect(cancellable.cancel()).toBe(false);
    expect(cancellable.isCancelled()).toBe(true);
    expect(cancellable.signal.aborted).toBe(true);
  });
});

describe("delay", () => {
  test("returns true after the delay", async () => {
    expect(await delay(1, new AbortController().signal)).toBe(true);
  });

  test("returns false when aborted", async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);
    controller.abort();

    expect(await pending).toBe(false);
  });
});

describe("ticks", () => {
  test("emits until cancelled, then completes", async () => {
    const cancellable = new TimerCancellable();
    const received: string[] = [];

    for await (const tick of ticks(0, 5, "tick", cancellable.signal)) {
      received.push(tick);
      if (received.length === 3) cancellable.cancel();
    }

    expect(received).toEqual(["tick", "tick", "tick"]);
  });

  test("emits nothing when cancelled before the first tick", async () => {
    const cancellable = new TimerCancellable();
    cancellable.cancel();

    const received: string[] = [];
    for await (const tick of ticks(0, 5, "tick", cancellable.signal)) {
      received.push(tick);
    }

    expect(received).toEqual([]);
  });
});
