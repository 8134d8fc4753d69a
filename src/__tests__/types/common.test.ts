import { describe, it, expect } from "vitest";
import {
  ok,
  err,
  mapResult,
  flatMapResult,
  traverseResults,
  type Result,
} from "../../types/common.js";

describe("ok()", () => {
  it("creates a successful result with the given data", () => {
    const result = ok(42n);
    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(42n);
  });

  it("keeps object data by reference", () => {
    const data = { S: "x" };
    const result = ok(data);
    if (result.success) expect(result.data).toBe(data);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(ok(1))).toBe(true);
  });
});

describe("err()", () => {
  it("creates a failed result with the given error", () => {
    const error = { type: "codec", message: "bad" };
    const result = err(error);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toBe(error);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(err("e"))).toBe(true);
  });
});

const failing = (error: string): Result<number, string> => err(error);

describe("mapResult()", () => {
  it("transforms the data on success", () => {
    const result = mapResult(ok(2), (n) => n * 10);
    if (result.success) expect(result.data).toBe(20);
    expect(result.success).toBe(true);
  });

  it("passes through errors without calling fn", () => {
    let called = false;
    const failed = failing("oops");
    const result = mapResult(failed, (n) => {
      called = true;
      return n;
    });
    expect(result).toBe(failed);
    expect(called).toBe(false);
  });
});

describe("flatMapResult()", () => {
  it("chains a second Result-returning function on success", () => {
    const result = flatMapResult(ok(5), (n) => ok(n + 1));
    expect(result).toEqual({ success: true, data: 6 });
  });

  it("short-circuits on the first error", () => {
    const result = flatMapResult(failing("first"), (n) => ok(n + 1));
    expect(result).toEqual({ success: false, error: "first" });
  });

  it("propagates errors from the chained function", () => {
    const result = flatMapResult(ok(5), () => err("second"));
    expect(result).toEqual({ success: false, error: "second" });
  });
});

describe("traverseResults()", () => {
  const parseDigits = (text: string): Result<number, string> =>
    /^\d+$/.test(text) ? ok(Number(text)) : err(text);

  it("collects every success in order", () => {
    expect(traverseResults(["1", "2", "3"], parseDigits)).toEqual({
      success: true,
      data: [1, 2, 3],
    });
  });

  it("returns an empty list for empty input", () => {
    expect(traverseResults([], parseDigits)).toEqual({ success: true, data: [] });
  });

  it("stops at the first failure", () => {
    const visited: number[] = [];
    const result = traverseResults(["1", "x", "y"], (text, index) => {
      visited.push(index);
      return parseDigits(text);
    });
    expect(result).toEqual({ success: false, error: "x" });
    expect(visited).toEqual([0, 1]);
  });
});
