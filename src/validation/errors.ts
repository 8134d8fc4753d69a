/**
 * Validation error types for option and input checking.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";

/** A single validation issue with path and message. */
export interface ValidationIssue {
  readonly message: string;
  readonly path?: readonly PropertyKey[];
}

/** Error type returned when schema validation fails. */
export interface ValidationError {
  readonly type: "validation";
  readonly message: string;
  readonly issues: readonly ValidationIssue[];
}

const issueKey = (
  segment: PropertyKey | StandardSchemaV1.PathSegment,
): PropertyKey => (typeof segment === "object" ? segment.key : segment);

const describeIssue = (issue: ValidationIssue): string =>
  issue.path !== undefined && issue.path.length > 0
    ? `${issue.path.map(String).join(".")}: ${issue.message}`
    : issue.message;

/**
 * Creates a ValidationError from Standard Schema issues.
 *
 * Path segments are flattened to plain keys, so `[{ key: "mode" }]` and
 * `["mode"]` both read `mode`.
 */
export const createValidationError = (
  issues: ReadonlyArray<StandardSchemaV1.Issue>,
): ValidationError => {
  const normalized = issues.map(
    (issue): ValidationIssue =>
      Object.freeze({
        message: issue.message,
        ...(issue.path ? { path: Object.freeze(issue.path.map(issueKey)) } : {}),
      }),
  );
  return Object.freeze({
    type: "validation" as const,
    message: `Validation failed: ${normalized.map(describeIssue).join("; ")}`,
    issues: Object.freeze(normalized),
  });
};
