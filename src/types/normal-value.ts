/**
 * The plain JSON side of the conversion.
 *
 * Integers and floats are distinct kinds: an integer is a `bigint` and a float
 * is a `number`. `4n` marshalls to `{ N: "4" }` while `4` marshalls to
 * `{ N: "4.0" }`, so each comes back as the kind it started as.
 */

import { isPlainObject } from "../utils/plain-object.js";

/** A JSON scalar. */
export type NormalScalar = null | boolean | bigint | number | string;

/** An ordered JSON array. */
export type NormalList = readonly NormalValue[];

/** A JSON object. Key order follows insertion order. */
export interface NormalMap {
  readonly [key: string]: NormalValue;
}

/** Any plain JSON value. */
export type NormalValue = NormalScalar | NormalList | NormalMap;

/** The kinds a {@link NormalValue} can have. */
export type NormalValueKind =
  | "null"
  | "bool"
  | "int"
  | "float"
  | "text"
  | "sequence"
  | "mapping";

/** A value paired with its kind, for exhaustive `switch` statements. */
export type ClassifiedNormalValue =
  | { readonly kind: "null"; readonly value: null }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "sequence"; readonly value: readonly unknown[] }
  | { readonly kind: "mapping"; readonly value: Readonly<Record<string, unknown>> };

/**
 * Classifies a value into its {@link NormalValueKind}.
 *
 * Returns `undefined` for anything the model does not cover: `undefined`,
 * functions, symbols and non-plain objects such as `Date` or `Set`.
 * Container contents are not inspected.
 */
export const classifyNormalValue = (
  value: unknown,
): ClassifiedNormalValue | undefined => {
  if (value === null) return { kind: "null", value };
  switch (typeof value) {
    case "boolean":
      return { kind: "bool", value };
    case "bigint":
      return { kind: "int", value };
    case "number":
      return { kind: "float", value };
    case "string":
      return { kind: "text", value };
    case "object":
      if (Array.isArray(value)) return { kind: "sequence", value };
      return isPlainObject(value) ? { kind: "mapping", value } : undefined;
    default:
      return undefined;
  }
};

export const getNormalValueKind = (
  value: unknown,
): NormalValueKind | undefined => classifyNormalValue(value)?.kind;
