/**
 * True for objects created by `{}` literals, `JSON.parse`-style parsers, or
 * `Object.create(null)`. Arrays and class instances (`Date`, `Map`, `Set`,
 * `Uint8Array`, ...) are rejected.
 */
export const isPlainObject = (
  value: unknown,
): value is Readonly<Record<string, unknown>> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/** Short human description of a value's JSON type, for error messages. */
export const describeJsonType = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "bigint") return "number";
  if (isPlainObject(value)) return "object";
  if (typeof value === "object" && value !== null) {
    const name: unknown = value.constructor?.name;
    return typeof name === "string" && name !== "" && name !== "Object"
      ? `${name} instance`
      : "non-plain object";
  }
  return typeof value;
};
