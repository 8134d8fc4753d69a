/**
 * Marshalls plain JSON values into DynamoDB JSON.
 *
 * Self-contained implementation with no AWS SDK dependency.
 */

import {
  type Result,
  ok,
  err,
  mapResult,
  traverseResults,
} from "../types/common.js";
import { classifyNormalValue } from "../types/normal-value.js";
import { isPlainObject } from "../utils/plain-object.js";
import { type ItemEnvelope, wrapItem } from "./envelope.js";
import { type AttributePath, type CodecError, createCodecError } from "./errors.js";
import { formatFloat, formatInteger } from "./number.js";
import type { AttributeValue, AttributeMap } from "./types.js";

/**
 * Marshalls a single value into a DynamoDB AttributeValue.
 *
 * Conversion rules:
 * - `null` -> `{ NULL: true }`
 * - `boolean` -> `{ BOOL: ... }`
 * - `bigint` -> `{ N: "..." }` (integer literal)
 * - `number` -> `{ N: "..." }` (float literal, `3` becomes `"3.0"`)
 * - `string` -> `{ S: "..." }`
 * - `Array` -> `{ L: [...] }`, whatever the element types
 * - Plain object -> `{ M: { ... } }`
 *
 * Sets are never produced: every array becomes `L`.
 *
 * @param value - The value to marshall
 * @param path - Location of `value` in the enclosing document, used in errors
 */
export const marshallValue = (
  value: unknown,
  path: AttributePath = [],
): Result<AttributeValue, CodecError> => {
  const classified = classifyNormalValue(value);
  if (classified === undefined) {
    return err(
      createCodecError(
        "UnsupportedNormalValueKind",
        `Cannot marshall value of type ${describeValue(value)}`,
        path,
      ),
    );
  }

  switch (classified.kind) {
    case "null":
      return ok({ NULL: true });
    case "bool":
      return ok({ BOOL: classified.value });
    case "int":
      return ok({ N: formatInteger(classified.value) });
    case "float": {
      const literal = formatFloat(classified.value);
      return literal.success
        ? ok({ N: literal.data })
        : err(createCodecError("InvalidNumberLiteral", literal.error, path));
    }
    case "text":
      return ok({ S: classified.value });
    case "sequence":
      return marshallList(classified.value, path);
    case "mapping":
      return mapResult(marshallAttributes(classified.value, path), (map) => ({
        M: map,
      }));
    default: {
      const unreachable: never = classified;
      return unreachable;
    }
  }
};

const describeValue = (value: unknown): string => {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
};

const marshallList = (
  list: readonly unknown[],
  path: AttributePath,
): Result<AttributeValue, CodecError> =>
  mapResult(
    traverseResults(list, (item, index) => marshallValue(item, [...path, index])),
    (items) => ({ L: items }),
  );

const marshallAttributes = (
  obj: Readonly<Record<string, unknown>>,
  path: AttributePath,
): Result<AttributeMap, CodecError> => {
  const entries: [string, AttributeValue][] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue; // dropped, as JSON.stringify does
    const result = marshallValue(value, [...path, key]);
    if (!result.success) return result;
    entries.push([key, result.data]);
  }
  return ok(Object.fromEntries(entries));
};

/**
 * Marshalls a plain object into a DynamoDB item (AttributeMap).
 *
 * Attributes whose value is `undefined` are skipped.
 */
export const marshallItem = (
  item: Readonly<Record<string, unknown>>,
): Result<AttributeMap, CodecError> => marshallAttributes(item, []);

/** Options for {@link marshallDocument}. */
export interface MarshallDocumentOptions {
  /**
   * Wrap an object root as `{ Item: ... }`. Ignored when the root is not an
   * object. Default: `true`.
   */
  readonly wrapItem?: boolean | undefined;
}

/** What {@link marshallDocument} produces. */
export type DynamoDocument =
  | AttributeMap
  | ItemEnvelope<AttributeMap>
  | AttributeValue;

/**
 * Marshalls a whole document.
 *
 * An object root is treated as an item and, unless `wrapItem` is `false`,
 * wrapped in the `Item` envelope. Any other root becomes a single
 * AttributeValue.
 *
 * @example
 * ```ts
 * marshallDocument({ age: 30n });                      // { Item: { age: { N: "30" } } }
 * marshallDocument({ age: 30n }, { wrapItem: false }); // { age: { N: "30" } }
 * marshallDocument("hi");                              // { S: "hi" }
 * ```
 */
export const marshallDocument = (
  value: unknown,
  options: MarshallDocumentOptions = {},
): Result<DynamoDocument, CodecError> => {
  if (!isPlainObject(value)) {
    return marshallValue(value);
  }
  const item = marshallItem(value);
  return options.wrapItem === false ? item : mapResult(item, wrapItem);
};
