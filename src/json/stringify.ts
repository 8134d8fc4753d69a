/**
 * JSON text output for converted documents.
 */

import { LosslessNumber, stringify } from "lossless-json";
import { formatFloat } from "../marshalling/number.js";
import { type Result, ok, err, mapResult, traverseResults } from "../types/common.js";
import { isPlainObject } from "../utils/plain-object.js";

/** Error returned when a value cannot be written as JSON. */
export interface JsonOutputError {
  readonly type: "json";
  readonly message: string;
}

export interface StringifyOptions {
  /** Indent nested values by two spaces. Default: `false`. */
  readonly pretty?: boolean | undefined;
}

// Numbers are swapped for LosslessNumbers holding their exact output text.
const toLossless = (value: unknown): Result<unknown, JsonOutputError> => {
  if (typeof value === "bigint") {
    return ok(new LosslessNumber(value.toString()));
  }
  if (typeof value === "number") {
    const literal = formatFloat(value);
    return literal.success
      ? ok(new LosslessNumber(literal.data))
      : err({ type: "json" as const, message: literal.error });
  }
  if (Array.isArray(value)) {
    return traverseResults(value, toLossless);
  }
  if (isPlainObject(value)) {
    return mapResult(
      traverseResults(Object.entries(value), ([key, child]) =>
        mapResult(toLossless(child), (converted): [string, unknown] => [key, converted]),
      ),
      (entries) => Object.fromEntries(entries),
    );
  }
  return ok(value);
};

/**
 * Serializes a value as JSON text.
 *
 * `bigint` values are written as integer literals and `number` values as
 * float literals, so `4n` becomes `4` and `4` becomes `4.0`.
 */
export const stringifyJson = (
  value: unknown,
  options: StringifyOptions = {},
): Result<string, JsonOutputError> => {
  const prepared = toLossless(value);
  if (!prepared.success) return prepared;

  const text = stringify(
    prepared.data,
    undefined,
    options.pretty === true ? 2 : undefined,
  );
  return text === undefined
    ? err({ type: "json" as const, message: "Value has no JSON representation" })
    : ok(text);
};
