import { describe, it, expect } from "vitest";
import { detectFraming, looksLikeSingleJsonValue } from "../../framing/detect.js";

describe("looksLikeSingleJsonValue()", () => {
  it.each([
    ['{"a":1}', true],
    ["  [1, 2]  ", true],
    ["42", true],
    ['"text"', true],
    ["{", false],
    ['{"a":', false],
    ["", false],
    ["   ", false],
  ])("%j -> %s", (text, expected) => {
    expect(looksLikeSingleJsonValue(text)).toBe(expected);
  });
});

describe("detectFraming()", () => {
  it("picks jsonl when the first line is a whole document", () => {
    expect(detectFraming({ firstLine: '{"a":{"N":"1"}}' })).toBe("jsonl");
  });

  it("picks json when the first line opens a larger document", () => {
    expect(detectFraming({ firstLine: "{" })).toBe("json");
  });

  it("picks json for a blank first line", () => {
    expect(detectFraming({ firstLine: "" })).toBe("json");
  });

  it("forces jsonl for a .jsonl file", () => {
    expect(detectFraming({ firstLine: "{", sourceName: "export.JSONL" })).toBe("jsonl");
  });

  it("does not force anything for other extensions", () => {
    expect(detectFraming({ firstLine: "{", sourceName: "export.json" })).toBe("json");
  });

  it("lets an explicit format win", () => {
    expect(detectFraming({ firstLine: '{"a":1}', format: "json" })).toBe("json");
    expect(
      detectFraming({ firstLine: "{", sourceName: "a.json", format: "jsonl" }),
    ).toBe("jsonl");
    expect(detectFraming({ firstLine: "{", sourceName: "a.jsonl", format: "json" })).toBe(
      "json",
    );
  });
});
