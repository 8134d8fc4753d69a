/**
 * The optional `{ "Item": { ... } }` wrapper around a DynamoDB item.
 *
 * Unwrapping is decided purely by shape; wrapping is always the caller's
 * choice.
 */

import { isPlainObject } from "../utils/plain-object.js";

export const ITEM_ENVELOPE_KEY = "Item";

/** An item wrapped one level deeper under `Item`. */
export interface ItemEnvelope<T> {
  readonly Item: T;
}

/**
 * True iff `document` has exactly one key, that key is `Item`, and its value
 * is itself an object.
 */
export const isItemEnvelope = (
  document: unknown,
): document is ItemEnvelope<Readonly<Record<string, unknown>>> => {
  if (!isPlainObject(document)) return false;
  const keys = Object.keys(document);
  return (
    keys.length === 1 &&
    keys[0] === ITEM_ENVELOPE_KEY &&
    isPlainObject(document[ITEM_ENVELOPE_KEY])
  );
};

/** Wraps an item as `{ Item: item }`. */
export const wrapItem = <T>(item: T): ItemEnvelope<T> => ({ Item: item });

/** Removes the `Item` envelope if present; any other document passes through. */
export const unwrapItem = (document: unknown): unknown =>
  isItemEnvelope(document) ? document.Item : document;
