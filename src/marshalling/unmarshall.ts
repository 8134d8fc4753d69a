/**
 * Unmarshalls DynamoDB JSON back into plain JSON values.
 *
 * Self-contained implementation with no AWS SDK dependency. Input is
 * whatever a JSON parser produced, so every payload is checked before use.
 */

import {
  type Result,
  ok,
  err,
  traverseResults,
} from "../types/common.js";
import type { NormalMap, NormalValue } from "../types/normal-value.js";
import { describeJsonType, isPlainObject } from "../utils/plain-object.js";
import { ITEM_ENVELOPE_KEY, isItemEnvelope } from "./envelope.js";
import {
  type AttributePath,
  type CodecError,
  type CodecErrorCode,
  createCodecError,
} from "./errors.js";
import { parseDecimalLiteral } from "./number.js";
import { type AttributeValueType, isAttributeValueType } from "./types.js";

const fail = (
  code: CodecErrorCode,
  detail: string,
  path: AttributePath,
): Result<never, CodecError> => err(createCodecError(code, detail, path));

interface TagObject {
  readonly tag: AttributeValueType;
  readonly payload: unknown;
}

const readTagObject = (
  value: unknown,
  path: AttributePath,
): Result<TagObject, CodecError> => {
  if (!isPlainObject(value)) {
    return fail(
      "MalformedTagObject",
      `Expected a DynamoDB type object, got ${describeJsonType(value)}`,
      path,
    );
  }
  const keys = Object.keys(value);
  const [tag] = keys;
  if (keys.length !== 1 || tag === undefined) {
    return fail(
      "MalformedTagObject",
      `DynamoDB type object must have exactly one key, got ${keys.length}`,
      path,
    );
  }
  if (!isAttributeValueType(tag)) {
    return fail("UnknownTag", `Unknown DynamoDB type tag "${tag}"`, path);
  }
  return ok({ tag, payload: value[tag] });
};

const expectString = (
  tag: AttributeValueType,
  payload: unknown,
  path: AttributePath,
): Result<string, CodecError> =>
  typeof payload === "string"
    ? ok(payload)
    : fail(
        "TypeMismatch",
        `${tag} payload must be a string, got ${describeJsonType(payload)}`,
        path,
      );

const expectArray = (
  tag: AttributeValueType,
  payload: unknown,
  path: AttributePath,
): Result<readonly unknown[], CodecError> =>
  Array.isArray(payload)
    ? ok(payload)
    : fail(
        "TypeMismatch",
        `${tag} payload must be an array, got ${describeJsonType(payload)}`,
        path,
      );

const expectStringArray = (
  tag: AttributeValueType,
  payload: unknown,
  path: AttributePath,
): Result<string[], CodecError> => {
  const array = expectArray(tag, payload, path);
  if (!array.success) return array;
  return traverseResults(array.data, (element, index) =>
    typeof element === "string"
      ? ok(element)
      : fail(
          "TypeMismatch",
          `${tag} elements must be strings, got ${describeJsonType(element)}`,
          [...path, index],
        ),
  );
};

const parseNumber = (
  text: string,
  path: AttributePath,
): Result<bigint | number, CodecError> => {
  const parsed = parseDecimalLiteral(text);
  return parsed.success
    ? parsed
    : fail("InvalidNumberLiteral", parsed.error, path);
};

const unmarshallEntries = (
  map: Readonly<Record<string, unknown>>,
  path: AttributePath,
): Result<NormalMap, CodecError> => {
  const entries: [string, NormalValue][] = [];
  for (const [key, value] of Object.entries(map)) {
    const result = unmarshallValue(value, [...path, key]);
    if (!result.success) return result;
    entries.push([key, result.data]);
  }
  return ok(Object.fromEntries(entries));
};

/**
 * Unmarshalls a single DynamoDB AttributeValue into a plain value.
 *
 * Conversion rules:
 * - `{ S: "..." }` -> `string`
 * - `{ N: "..." }` -> `bigint`, or `number` if the literal has `.` or `e`
 * - `{ BOOL: ... }` -> `boolean`
 * - `{ NULL: ... }` -> `null`, whatever the payload
 * - `{ M: { ... } }` -> object
 * - `{ L: [...] }` -> array
 * - `{ SS: [...] }`, `{ BS: [...] }` -> array of strings
 * - `{ NS: [...] }` -> array of numbers, parsed like `N`
 * - `{ B: "..." }` -> the base64 string itself
 *
 * @param av - The DynamoDB AttributeValue, as parsed from JSON
 * @param path - Location of `av` in the enclosing document, used in errors
 */
export const unmarshallValue = (
  av: unknown,
  path: AttributePath = [],
): Result<NormalValue, CodecError> => {
  const tagObject = readTagObject(av, path);
  if (!tagObject.success) return tagObject;
  const { tag, payload } = tagObject.data;

  switch (tag) {
    case "S":
    case "B":
      return expectString(tag, payload, path);
    case "N": {
      const text = expectString(tag, payload, path);
      return text.success ? parseNumber(text.data, path) : text;
    }
    case "BOOL":
      return typeof payload === "boolean"
        ? ok(payload)
        : fail(
            "TypeMismatch",
            `BOOL payload must be a boolean, got ${describeJsonType(payload)}`,
            path,
          );
    case "NULL":
      return ok(null);
    case "M":
      return isPlainObject(payload)
        ? unmarshallEntries(payload, path)
        : fail(
            "TypeMismatch",
            `M payload must be an object, got ${describeJsonType(payload)}`,
            path,
          );
    case "L": {
      const list = expectArray(tag, payload, path);
      if (!list.success) return list;
      return traverseResults(list.data, (element, index) =>
        unmarshallValue(element, [...path, index]),
      );
    }
    case "SS":
    case "BS":
      return expectStringArray(tag, payload, path);
    case "NS": {
      const texts = expectStringArray(tag, payload, path);
      if (!texts.success) return texts;
      return traverseResults(texts.data, (text, index) =>
        parseNumber(text, [...path, index]),
      );
    }
    default: {
      const unreachable: never = tag;
      return unreachable;
    }
  }
};

/**
 * Unmarshalls a DynamoDB item (AttributeMap) into a plain object.
 *
 * @param item - The item, as parsed from JSON
 * @param path - Location of the item in the enclosing document, used in errors
 */
export const unmarshallItem = (
  item: unknown,
  path: AttributePath = [],
): Result<NormalMap, CodecError> =>
  isPlainObject(item)
    ? unmarshallEntries(item, path)
    : fail(
        "TypeMismatch",
        `Expected a JSON object for a DynamoDB item, got ${describeJsonType(item)}`,
        path,
      );

/**
 * Unmarshalls a DynamoDB item document, with or without the `Item` envelope.
 *
 * `{ "Item": { ... } }` is unwrapped first; error paths then start at `Item`.
 *
 * @example
 * ```ts
 * unmarshallDocument({ Item: { age: { N: "30" } } }); // ok({ age: 30n })
 * unmarshallDocument({ age: { N: "30" } });           // ok({ age: 30n })
 * ```
 */
export const unmarshallDocument = (
  document: unknown,
): Result<NormalMap, CodecError> =>
  isItemEnvelope(document)
    ? unmarshallItem(document.Item, [ITEM_ENVELOPE_KEY])
    : unmarshallItem(document);
