/**
 * ddb-json: convert between DynamoDB JSON and plain JSON.
 *
 * The codec works on parsed value trees and never throws; every operation
 * returns a `Result`. Integers are `bigint` and floats are `number`, so
 * `{ N: "4" }` and `{ N: "4.0" }` stay distinguishable.
 *
 * @example
 * ```ts
 * import { parseJson, unmarshallDocument, marshallDocument } from "ddb-json";
 *
 * const parsed = parseJson('{"Item":{"age":{"N":"30"},"tags":{"SS":["x"]}}}');
 * if (parsed.success) {
 *   const plain = unmarshallDocument(parsed.data); // ok({ age: 30n, tags: ["x"] })
 *   if (plain.success) {
 *     marshallDocument(plain.data, { wrapItem: false });
 *     // ok({ age: { N: "30" }, tags: { L: [{ S: "x" }] } })
 *   }
 * }
 * ```
 */

// Value model
export type {
  NormalValue,
  NormalScalar,
  NormalList,
  NormalMap,
  NormalValueKind,
  ClassifiedNormalValue,
} from "./types/normal-value.js";
export { classifyNormalValue, getNormalValueKind } from "./types/normal-value.js";
export type { AttributeValue, AttributeMap, AttributeValueType } from "./marshalling/types.js";
export { ATTRIBUTE_VALUE_TYPES, isAttributeValueType } from "./marshalling/types.js";

// Codec
export { marshallValue, marshallItem, marshallDocument } from "./marshalling/marshall.js";
export type { MarshallDocumentOptions, DynamoDocument } from "./marshalling/marshall.js";
export { unmarshallValue, unmarshallItem, unmarshallDocument } from "./marshalling/unmarshall.js";
export { ITEM_ENVELOPE_KEY, isItemEnvelope, wrapItem, unwrapItem } from "./marshalling/envelope.js";
export type { ItemEnvelope } from "./marshalling/envelope.js";
export {
  decimalLiteralSchema,
  isFloatLiteral,
  toDecimalLiteral,
  parseDecimalLiteral,
  formatInteger,
  formatFloat,
} from "./marshalling/number.js";
export type { DecimalLiteral } from "./marshalling/number.js";
export { createCodecError, formatAttributePath } from "./marshalling/errors.js";
export type { CodecError, CodecErrorCode, AttributePath } from "./marshalling/errors.js";

// Framing
export { looksLikeSingleJsonValue, detectFraming } from "./framing/detect.js";
export type { InputFraming, DetectFramingInput } from "./framing/detect.js";

// JSON text
export { parseJson, parseNumberLiteral } from "./json/parse.js";
export type { JsonSyntaxError } from "./json/parse.js";
export { stringifyJson } from "./json/stringify.js";
export type { JsonOutputError, StringifyOptions } from "./json/stringify.js";

// Conversion driver
export { convertValue, convertText, convertStream } from "./cli/convert.js";
export type {
  ConversionMode,
  RootShape,
  ConvertOptions,
  ConvertStreamOptions,
  ConversionError,
  ConversionSummary,
} from "./cli/convert.js";

// Result type and helpers
export {
  type Result,
  ok,
  err,
  mapResult,
  flatMapResult,
  traverseResults,
} from "./types/common.js";

// Validation
export { validate } from "./validation/validate.js";
export type { ValidationError, ValidationIssue } from "./validation/errors.js";

// Logging
export { Logger, createLogger } from "./utils/logger.js";
export type { LogLevel, LoggerOptions, LogSink } from "./utils/logger.js";
