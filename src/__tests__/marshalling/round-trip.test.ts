import { describe, it, expect } from "vitest";
import { marshallDocument, marshallValue } from "../../marshalling/marshall.js";
import { unmarshallDocument, unmarshallValue } from "../../marshalling/unmarshall.js";
import { alicePlain, everyKindPlain } from "../fixtures.js";

const roundTrip = (item: unknown) => {
  const marshalled = marshallDocument(item, { wrapItem: true });
  if (!marshalled.success) throw new Error(marshalled.error.message);
  return unmarshallDocument(marshalled.data);
};

describe("item round trip", () => {
  it.each([
    ["every kind", everyKindPlain],
    ["the example item", alicePlain],
    ["an empty item", {}],
    ["integral floats", { one: 1, zero: 0, negative: -5, hundred: 100 }],
    ["large integers", { big: 123456789012345678901234567890n, small: -9007199254740993n }],
    ["small and large floats", { tiny: 2.5e-8, huge: 1e21, pi: 3.14159 }],
  ])("returns %s unchanged", (_label, item) => {
    expect(roundTrip(item)).toEqual({ success: true, data: item });
  });

  it("keeps 3.0 a float", () => {
    const result = roundTrip({ value: 3 });
    expect(result.success).toBe(true);
    if (result.success) expect(typeof result.data["value"]).toBe("number");
  });

  it("keeps 3 an integer", () => {
    const result = roundTrip({ value: 3n });
    expect(result.success).toBe(true);
    if (result.success) expect(result.data["value"]).toBe(3n);
  });
});

describe("tag shapes only normalize one way", () => {
  it("turns NS into L after a round trip", () => {
    const plain = unmarshallValue({ NS: ["1", "2"] });
    if (!plain.success) throw new Error(plain.error.message);
    expect(marshallValue(plain.data)).toEqual({
      success: true,
      data: { L: [{ N: "1" }, { N: "2" }] },
    });
  });

  it("turns BS into a list of strings", () => {
    const plain = unmarshallValue({ BS: ["YQ=="] });
    if (!plain.success) throw new Error(plain.error.message);
    expect(marshallValue(plain.data)).toEqual({ success: true, data: { L: [{ S: "YQ==" }] } });
  });

  it("turns 1e0 into the float 1, which marshalls as 1.0", () => {
    const plain = unmarshallValue({ N: "1e0" });
    if (!plain.success) throw new Error(plain.error.message);
    expect(marshallValue(plain.data)).toEqual({ success: true, data: { N: "1.0" } });
  });
});
