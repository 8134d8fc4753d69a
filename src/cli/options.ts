/**
 * CLI option schema. Raw values from the argument parser are checked here
 * before anything is opened or converted.
 *
 * `withoutItem` only affects to-ddb and `root` only affects from-ddb; each is
 * accepted and ignored in the other mode.
 */

import { z } from "zod";
import type { Result } from "../types/common.js";
import type { ValidationError } from "../validation/errors.js";
import { validate } from "../validation/validate.js";

export const cliOptionsSchema = z.object({
  mode: z.enum(["from-ddb", "to-ddb"], {
    errorMap: () => ({ message: 'must be "from-ddb" or "to-ddb"' }),
  }),
  input: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  pretty: z.boolean().default(false),
  withoutItem: z.boolean().default(false),
  root: z.enum(["item", "value"]).default("item"),
  format: z.enum(["auto", "json", "jsonl"]).default("auto"),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

/** Validates raw option values, filling in defaults. */
export const resolveCliOptions = (
  raw: unknown,
): Promise<Result<CliOptions, ValidationError>> =>
  validate(cliOptionsSchema, raw);
