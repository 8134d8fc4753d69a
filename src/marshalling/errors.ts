/**
 * Error type for marshalling and unmarshalling failures.
 */

/** Why a conversion failed. */
export type CodecErrorCode =
  /** A DynamoDB-side value is not an object, or has other than one key. */
  | "MalformedTagObject"
  /** The single key is not a DynamoDB type tag. */
  | "UnknownTag"
  /** An `N`/`NS` payload is not a number literal, or a float is not finite. */
  | "InvalidNumberLiteral"
  /** A payload (or document root) has the wrong JSON type. */
  | "TypeMismatch"
  /** A value outside the plain JSON model was given to the marshaller. */
  | "UnsupportedNormalValueKind";

/** Map keys and list indexes leading from the document root to a value. */
export type AttributePath = readonly (string | number)[];

/** Error type returned when a value cannot be converted. */
export interface CodecError {
  readonly type: "codec";
  readonly code: CodecErrorCode;
  readonly message: string;
  readonly path: AttributePath;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Renders a path the way it would be written in JavaScript.
 *
 * @example
 * ```ts
 * formatAttributePath(["Item", "tags", 0, "odd key"]); // 'Item.tags[0]["odd key"]'
 * ```
 */
export const formatAttributePath = (path: AttributePath): string =>
  path
    .map((segment, index) => {
      if (typeof segment === "number") return `[${segment}]`;
      if (!IDENTIFIER.test(segment)) return `[${JSON.stringify(segment)}]`;
      return index === 0 ? segment : `.${segment}`;
    })
    .join("");

/**
 * Creates a CodecError. The message names the path when there is one.
 */
export const createCodecError = (
  code: CodecErrorCode,
  detail: string,
  path: AttributePath,
): CodecError =>
  Object.freeze({
    type: "codec" as const,
    code,
    message:
      path.length > 0 ? `${detail} at ${formatAttributePath(path)}` : detail,
    path: Object.freeze([...path]),
  });
