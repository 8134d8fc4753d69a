import { describe, it, expect } from "vitest";
import {
  classifyNormalValue,
  getNormalValueKind,
} from "../../types/normal-value.js";

describe("getNormalValueKind()", () => {
  it.each([
    [null, "null"],
    [true, "bool"],
    [12n, "int"],
    [12, "float"],
    [1.5, "float"],
    ["", "text"],
    [[], "sequence"],
    [{}, "mapping"],
    [Object.create(null), "mapping"],
  ])("classifies %o as %s", (value, kind) => {
    expect(getNormalValueKind(value)).toBe(kind);
  });

  it.each([
    ["undefined", undefined],
    ["a function", () => 1],
    ["a symbol", Symbol("s")],
    ["a Date", new Date(0)],
    ["a Set", new Set(["a"])],
    ["a Map", new Map()],
    ["a Uint8Array", new Uint8Array([1])],
  ])("returns undefined for %s", (_label, value) => {
    expect(getNormalValueKind(value)).toBeUndefined();
  });
});

describe("classifyNormalValue()", () => {
  it("pairs the kind with the value", () => {
    const list = ["a"];
    expect(classifyNormalValue(list)).toEqual({ kind: "sequence", value: list });
    expect(classifyNormalValue(7n)).toEqual({ kind: "int", value: 7n });
  });
});
