import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, test } from "vitest";
import { createLogger } from "../logging/logger";
import { ElementTypes } from "./element-type";
import { ErrorStrategy, RunCancelledError, StageFailedError } from "./errors";
import {
  abortable,
  drop,
  filter,
  fromIterable,
  fromPromise,
  grouped,
  map,
  mapConcat,
  take,
  takeWhile,
  tap,
  validate,
} from "./generators";

const logger = createLogger("generators-test");

async function collect<T>(stream: AsyncGenerator<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}

describe("fromIterable", () => {
  test("streams array items", async () => {
    expect(await collect(fromIterable([1, 2, 3]))).toEqual([1, 2, 3]);
  });

  test("streams async iterables", async () => {
    async function* letters() {
      yield "a";
      yield "b";
    }
    expect(await collect(fromIterable(letters()))).toEqual(["a", "b"]);
  });

  test("handles empty input", async () => {
    expect(await collect(fromIterable([]))).toEqual([]);
  });
});

describe("fromPromise", () => {
  test("emits the resolved value", async () => {
    expect(await collect(fromPromise(Promise.resolve(5), "fromPromise"))).toEqual([5]);
  });

  test("fails the stream when the promise rejects", async () => {
    const error = await collect(fromPromise(Promise.reject(new Error("nope")), "fromPromise")).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(StageFailedError);
    expect(error).toMatchObject({ stageName: "fromPromise", elementIndex: 0 });
  });
});

describe("map", () => {
  test("transforms items with their index", async () => {
    const stream = map(fromIterable(["a", "b"]), (item, index) => `${item}${index}`, {
      stageName: "map",
      onError: ErrorStrategy.FAIL,
      logger,
    });
    expect(await collect(stream)).toEqual(["a0", "b1"]);
  });

  test("fails with StageFailedError by default", async () => {
    const stream = map(
      fromIterable([1, 2, 3]),
      (n) => {
        if (n === 2) throw new Error("bad");
        return n;
      },
      { stageName: "map", onError: ErrorStrategy.FAIL, logger },
    );

    await expect(collect(stream)).rejects.toThrow('Stage "map" failed on element 1: bad');
  });

  test("skips failing items with ErrorStrategy.SKIP", async () => {
    const stream = map(
      fromIterable([1, 2, 3]),
      async (n) => {
        if (n === 2) throw new Error("bad");
        return n * 10;
      },
      { stageName: "map", onError: ErrorStrategy.SKIP, logger },
    );

    expect(await collect(stream)).toEqual([10, 30]);
  });
});

describe("filter", () => {
  test("keeps matching items", async () => {
    expect(await collect(filter(fromIterable([1, 2, 3, 4]), (n) => n % 2 === 0, "filter"))).toEqual([2, 4]);
  });
});

describe("mapConcat", () => {
  test("flattens the returned iterables", async () => {
    expect(await collect(mapConcat(fromIterable([1, 2, 3]), (n) => Array.from({ length: n }, () => n), "mapConcat"))).toEqual([
      1, 2, 2, 3, 3, 3,
    ]);
  });
});

describe("take", () => {
  test("takes the first n items and closes the upstream", async () => {
    let closed = false;
    async function* source() {
      try {
        yield 1;
        yield 2;
        yield 3;
      } finally {
        closed = true;
      }
    }

    expect(await collect(take(source(), 2))).toEqual([1, 2]);
    expect(closed).toBe(true);
  });

  test("take(0) emits nothing", async () => {
    expect(await collect(take(fromIterable([1, 2]), 0))).toEqual([]);
  });
});

describe("drop", () => {
  test("skips the first n items", async () => {
    expect(await collect(drop(fromIterable([1, 2, 3, 4]), 2))).toEqual([3, 4]);
  });

  test("dropping more than available emits nothing", async () => {
    expect(await collect(drop(fromIterable([1, 2]), 5))).toEqual([]);
  });
});

describe("takeWhile", () => {
  test("stops at the first failing item", async () => {
    expect(await collect(takeWhile(fromIterable([1, 2, 5, 1]), (n) => n < 3, "takeWhile"))).toEqual([1, 2]);
  });
});

describe("grouped", () => {
  test("groups items and emits the shorter remainder", async () => {
    expect(await collect(grouped(fromIterable([1, 2, 3, 4, 5]), 2))).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe("tap", () => {
  test("runs side effects without changing items", async () => {
    const seen: Array<[string, number]> = [];
    const result = await collect(tap(fromIterable(["x", "y"]), (item, index) => seen.push([item, index])));

    expect(result).toEqual(["x", "y"]);
    expect(seen).toEqual([
      ["x", 0],
      ["y", 1],
    ]);
  });
});

describe("validate", () => {
  test("passes items matching the element type", async () => {
    expect(await collect(validate(fromIterable([1, 2]), ElementTypes.number, "check"))).toEqual([1, 2]);
  });

  test("fails on the first invalid item", async () => {
    const error = await collect(validate(fromIterable<unknown>([1, "two", 3]), ElementTypes.number, "check")).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(StageFailedError);
    expect(error).toMatchObject({ stageName: "check", elementIndex: 1, code: "STAGE_FAILED" });
  });
});

describe("abortable", () => {
  test("passes items through while the signal is live", async () => {
    const controller = new AbortController();
    expect(await collect(abortable(fromIterable([1, 2, 3]), controller.signal, logger))).toEqual([1, 2, 3]);
  });

  test("throws RunCancelledError when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(collect(abortable(fromIterable([1]), controller.signal, logger))).rejects.toThrow(
      RunCancelledError,
    );
  });

  test("abandons a pending pull when the signal aborts", async () => {
    async function* slow() {
      await sleep(20);
      yield 1;
    }
    const controller = new AbortController();
    const stream = abortable(slow(), controller.signal, logger, "run-1");

    const pending = stream.next();
    controller.abort();

    await expect(pending).rejects.toThrow("Run run-1 was cancelled");
  });
});
