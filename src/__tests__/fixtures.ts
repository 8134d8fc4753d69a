/**
 * Shared test fixtures used across all test files.
 */

import { Readable, Writable } from "node:stream";
import type { LogSink } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** An item that uses a string set, as exported from a table. */
export const aliceDynamo = {
  name: { S: "Alice" },
  age: { N: "30" },
  tags: { SS: ["x", "y"] },
} as const;

/** `aliceDynamo` unmarshalled. */
export const alicePlain = { name: "Alice", age: 30n, tags: ["x", "y"] };

/** `alicePlain` marshalled again: the set comes back as a list. */
export const aliceRemarshalled = {
  name: { S: "Alice" },
  age: { N: "30" },
  tags: { L: [{ S: "x" }, { S: "y" }] },
};

/** Every plain kind, nested. */
export const everyKindPlain = {
  nothing: null,
  yes: true,
  no: false,
  count: 42n,
  ratio: 0.25,
  whole: 3,
  negative: -7n,
  label: "héllo \"quoted\"",
  empty: "",
  list: [1n, "two", [3.5], { four: 4n }],
  nested: { deeper: { deepest: [] } },
};

export const everyKindDynamo = {
  nothing: { NULL: true },
  yes: { BOOL: true },
  no: { BOOL: false },
  count: { N: "42" },
  ratio: { N: "0.25" },
  whole: { N: "3.0" },
  negative: { N: "-7" },
  label: { S: "héllo \"quoted\"" },
  empty: { S: "" },
  list: {
    L: [
      { N: "1" },
      { S: "two" },
      { L: [{ N: "3.5" }] },
      { M: { four: { N: "4" } } },
    ],
  },
  nested: { M: { deeper: { M: { deepest: { L: [] } } } } },
};

// ---------------------------------------------------------------------------
// Streams
// ---------------------------------------------------------------------------

/** A readable stream over the given text. */
export const textStream = (text: string): Readable => Readable.from([text]);

/** A writable stream that records everything written to it. */
export const createCollector = (): {
  readonly stream: Writable & LogSink;
  readonly text: () => string;
} => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
};
