/**
 * Checks raw CLI flags against a Standard Schema before any file is opened,
 * turning the schema's issues into a `ValidationError` Result.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Result, ok, err } from "../types/common.js";
import { type ValidationError, createValidationError } from "./errors.js";

/**
 * Validates a value against a Standard Schema V1 compatible schema (zod,
 * valibot, ArkType, ...).
 *
 * @example
 * ```ts
 * const result = await validate(z.enum(["from-ddb", "to-ddb"]), "to-ddb");
 * if (!result.success) console.error(result.error.message);
 * ```
 */
export const validate = async <Output>(
  schema: StandardSchemaV1<unknown, Output>,
  value: unknown,
): Promise<Result<Output, ValidationError>> => {
  const result = await schema["~standard"].validate(value);

  if (result.issues !== undefined) {
    return err(createValidationError(result.issues));
  }

  return ok(result.value);
};
