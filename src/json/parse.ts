/**
 * JSON text parsing that keeps integers and floats apart.
 *
 * `JSON.parse` turns both `4` and `4.0` into the same `number`. Parsing into a
 * `jsonc-parser` syntax tree gives each literal's offset instead, so a number
 * is read from its own source text.
 */

import jsonc from "jsonc-parser";
import type { Node as JsonNode, ParseError, ParseOptions } from "jsonc-parser";
import { isFloatLiteral } from "../marshalling/number.js";
import { type Result, ok, err, mapResult, traverseResults } from "../types/common.js";

const { parseTree, printParseErrorCode } = jsonc;

/** Error returned for text that is not valid JSON. */
export interface JsonSyntaxError {
  readonly type: "json";
  readonly message: string;
  readonly cause?: unknown;
}

// Strict JSON: no comments, no trailing commas, no empty document.
const STRICT_JSON: ParseOptions = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

/** Integer literals become `bigint`, float literals `number`. */
export const parseNumberLiteral = (text: string): bigint | number =>
  isFloatLiteral(text) ? Number(text) : BigInt(text);

const syntaxError = (
  detail: string,
  offset: number,
  cause?: unknown,
): Result<never, JsonSyntaxError> =>
  err({
    type: "json" as const,
    message: `Invalid JSON: ${detail} at position ${offset}`,
    ...(cause === undefined ? {} : { cause }),
  });

const readProperty = (
  property: JsonNode,
  text: string,
): Result<[string, unknown], JsonSyntaxError> => {
  const [keyNode, valueNode] = property.children ?? [];
  if (keyNode === undefined || valueNode === undefined || typeof keyNode.value !== "string") {
    return syntaxError("Incomplete property", property.offset);
  }
  const key: string = keyNode.value;
  return mapResult(readNode(valueNode, text), (value): [string, unknown] => [key, value]);
};

const readNode = (node: JsonNode, text: string): Result<unknown, JsonSyntaxError> => {
  switch (node.type) {
    case "object":
      // fromEntries defines own properties; a repeated key keeps its last value
      return mapResult(
        traverseResults(node.children ?? [], (property) => readProperty(property, text)),
        (entries) => Object.fromEntries(entries),
      );
    case "array":
      return traverseResults(node.children ?? [], (child) => readNode(child, text));
    case "number":
      return ok(parseNumberLiteral(text.slice(node.offset, node.offset + node.length)));
    case "string":
    case "boolean":
      return typeof node.value === node.type
        ? ok<unknown>(node.value)
        : syntaxError(`Malformed ${node.type}`, node.offset);
    case "null":
      return ok(null);
    case "property":
      return syntaxError("Unexpected property", node.offset);
    default: {
      const unreachable: never = node.type;
      return unreachable;
    }
  }
};

/**
 * Parses one JSON document.
 *
 * Object keys become own properties (`"__proto__"` included), and a repeated
 * key keeps the last value given for it.
 *
 * @example
 * ```ts
 * parseJson('{"a": 4, "b": 4.0}'); // ok({ a: 4n, b: 4 })
 * ```
 */
export const parseJson = (text: string): Result<unknown, JsonSyntaxError> => {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, STRICT_JSON);
  const [first] = errors;
  if (first !== undefined) {
    return syntaxError(printParseErrorCode(first.error), first.offset, errors);
  }
  if (root === undefined) {
    return syntaxError("ValueExpected", 0);
  }
  return readNode(root, text);
};
