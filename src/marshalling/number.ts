/**
 * Conversions between DynamoDB number literals and in-memory numbers.
 *
 * `N` payloads are always text. A literal containing `.` or an exponent
 * marker decodes to a float (`number`), anything else to an integer
 * (`bigint`). The rule is purely textual, so `"1e0"` is the float `1`, not
 * the integer `1n`.
 */

import { z } from "zod";
import { type Result, ok, err } from "../types/common.js";

const DECIMAL_LITERAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Validates a string as a decimal number literal and brands it. */
export const decimalLiteralSchema = z
  .string()
  .regex(DECIMAL_LITERAL_PATTERN, "Invalid number literal")
  .brand<"DecimalLiteral">();

/** Text holding a decimal number literal, as carried by `N` and `NS`. */
export type DecimalLiteral = z.infer<typeof decimalLiteralSchema>;

/** True if the literal decodes to a float rather than an integer. */
export const isFloatLiteral = (text: string): boolean =>
  text.includes(".") || text.includes("e") || text.includes("E");

/** Checks `text` against the literal grammar. */
export const toDecimalLiteral = (
  text: string,
): Result<DecimalLiteral, string> => {
  const parsed = decimalLiteralSchema.safeParse(text);
  return parsed.success
    ? ok(parsed.data)
    : err(`Invalid number literal "${text}"`);
};

/**
 * Parses a decimal literal into an integer (`bigint`) or a float (`number`).
 *
 * Fails for text outside the literal grammar and for float literals that
 * overflow to infinity.
 *
 * @example
 * ```ts
 * parseDecimalLiteral("4");   // ok(4n)
 * parseDecimalLiteral("4.0"); // ok(4)
 * parseDecimalLiteral("4e2"); // ok(400)
 * ```
 */
export const parseDecimalLiteral = (
  text: string,
): Result<bigint | number, string> => {
  const literal = toDecimalLiteral(text);
  if (!literal.success) return literal;

  if (!isFloatLiteral(text)) {
    return ok(BigInt(text));
  }

  const value = Number(text);
  if (!Number.isFinite(value)) {
    return err(`Number literal "${text}" is out of range`);
  }
  return ok(value);
};

/** Renders an integer as a decimal literal. */
export const formatInteger = (value: bigint): DecimalLiteral =>
  decimalLiteralSchema.parse(value.toString());

/**
 * Renders a float as a decimal literal that decodes back to a float.
 *
 * Integral values keep a `.0` suffix (`3` -> `"3.0"`, `-0` -> `"-0.0"`);
 * other values use JavaScript's shortest round-trip rendering, which already
 * contains `.` or an exponent.
 */
export const formatFloat = (value: number): Result<DecimalLiteral, string> => {
  if (!Number.isFinite(value)) {
    return err(`Cannot marshall non-finite number: ${value}`);
  }
  if (Object.is(value, -0)) {
    return ok(decimalLiteralSchema.parse("-0.0"));
  }
  const text = String(value);
  return ok(decimalLiteralSchema.parse(isFloatLiteral(text) ? text : `${text}.0`));
};
