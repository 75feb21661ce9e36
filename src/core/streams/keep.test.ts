import { describe, expect, test } from "vitest";
import { Keep, policyOf } from "./keep";
import { NotUsed } from "./types";

describe("Keep", () => {
  test("left and right pick one side", () => {
    expect(Keep.left(1, "a")).toBe(1);
    expect(Keep.right(1, "a")).toBe("a");
  });

  test("both keeps a tuple", () => {
    expect(Keep.both(1, "a")).toEqual([1, "a"]);
  });

  test("none discards both", () => {
    expect(Keep.none(1, "a")).toBe(NotUsed);
  });
});

describe("policyOf", () => {
  test("names the Keep combiners", () => {
    expect(policyOf(Keep.left)).toBe("left");
    expect(policyOf(Keep.right)).toBe("right");
    expect(policyOf(Keep.both)).toBe("both");
    expect(policyOf(Keep.none)).toBe("none");
  });

  test("treats other functions as custom", () => {
    expect(policyOf((left: number, right: number) => left + right)).toBe("custom");
  });
});
