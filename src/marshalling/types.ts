/**
 * DynamoDB JSON types.
 *
 * Every value is a single-key object whose key names the storage type.
 * Binary payloads (`B`, `BS`) stay as their base64 text; nothing here decodes
 * them.
 */

import type { DecimalLiteral } from "./number.js";

/** The DynamoDB type tags, in the order DynamoDB documents them. */
export const ATTRIBUTE_VALUE_TYPES = [
  "S",
  "N",
  "B",
  "SS",
  "NS",
  "BS",
  "M",
  "L",
  "NULL",
  "BOOL",
] as const;

/** Identifies which DynamoDB type tag an AttributeValue carries. */
export type AttributeValueType = (typeof ATTRIBUTE_VALUE_TYPES)[number];

/** A DynamoDB AttributeValue in its JSON form. */
export type AttributeValue =
  | { readonly S: string }
  | { readonly N: DecimalLiteral }
  | { readonly B: string }
  | { readonly SS: readonly string[] }
  | { readonly NS: readonly DecimalLiteral[] }
  | { readonly BS: readonly string[] }
  | { readonly M: AttributeMap }
  | { readonly L: readonly AttributeValue[] }
  | { readonly NULL: true }
  | { readonly BOOL: boolean };

/** A DynamoDB item: a record of attribute name to AttributeValue. */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

const TAG_SET: ReadonlySet<string> = new Set(ATTRIBUTE_VALUE_TYPES);

export const isAttributeValueType = (
  key: string,
): key is AttributeValueType => TAG_SET.has(key);
