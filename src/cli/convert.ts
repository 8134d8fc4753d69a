/**
 * Conversion driver: text and streams in, text and streams out.
 *
 * The codec works on parsed value trees. This module parses input text,
 * picks JSON or JSON Lines framing, runs the codec per document and writes
 * the serialized results.
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { type InputFraming, detectFraming } from "../framing/detect.js";
import { parseJson } from "../json/parse.js";
import { stringifyJson } from "../json/stringify.js";
import type { CodecError } from "../marshalling/errors.js";
import { marshallDocument } from "../marshalling/marshall.js";
import { unmarshallDocument, unmarshallValue } from "../marshalling/unmarshall.js";
import { type Result, ok, err, flatMapResult } from "../types/common.js";
import type { Logger } from "../utils/logger.js";

/** `from-ddb`: DynamoDB JSON to plain JSON. `to-ddb`: the reverse. */
export type ConversionMode = "from-ddb" | "to-ddb";

/**
 * Root shape expected by `from-ddb`: an item (optionally `Item`-wrapped) or a
 * single bare AttributeValue.
 */
export type RootShape = "item" | "value";

export interface ConvertOptions {
  readonly mode: ConversionMode;
  /** Wrap `to-ddb` object output in `{ "Item": ... }`. Default: `true`. */
  readonly wrapItem?: boolean | undefined;
  /** Default: `"item"`. */
  readonly root?: RootShape | undefined;
  /** Indent output by two spaces. Default: `false`. */
  readonly pretty?: boolean | undefined;
}

/** Error type for a failed conversion of one input unit. */
export interface ConversionError {
  readonly type: "json" | "codec" | "io";
  readonly message: string;
  /** 1-based input line, for JSON Lines input. */
  readonly line?: number | undefined;
  readonly cause?: unknown;
}

const fromCodecError = (error: CodecError): ConversionError =>
  Object.freeze({ type: "codec" as const, message: error.message, cause: error });

const atLine = (error: ConversionError, line: number): ConversionError =>
  Object.freeze({ ...error, line, message: `Line ${line}: ${error.message}` });

/**
 * Converts one parsed document.
 */
export const convertValue = (
  value: unknown,
  options: ConvertOptions,
): Result<unknown, CodecError> => {
  if (options.mode === "to-ddb") {
    return marshallDocument(value, { wrapItem: options.wrapItem ?? true });
  }
  return (options.root ?? "item") === "value"
    ? unmarshallValue(value)
    : unmarshallDocument(value);
};

/**
 * Parses, converts and serializes one JSON document.
 *
 * @example
 * ```ts
 * convertText('{"Item":{"age":{"N":"30"}}}', { mode: "from-ddb" });
 * // ok('{"age":30}')
 * ```
 */
export const convertText = (
  text: string,
  options: ConvertOptions,
): Result<string, ConversionError> => {
  const converted = flatMapResult<unknown, unknown, ConversionError>(
    parseJson(text),
    (value) => {
      const result = convertValue(value, options);
      return result.success ? result : err(fromCodecError(result.error));
    },
  );
  return flatMapResult<unknown, string, ConversionError>(converted, (value) =>
    stringifyJson(value, { pretty: options.pretty }),
  );
};

export interface ConvertStreamOptions extends ConvertOptions {
  /** Forced framing; `auto` (the default) detects it. */
  readonly format?: InputFraming | "auto" | undefined;
  /** Input file name, used for `.jsonl` detection. */
  readonly sourceName?: string | undefined;
  readonly logger?: Logger | undefined;
}

export interface ConversionSummary {
  readonly framing: InputFraming;
  /** Documents written to the output. */
  readonly records: number;
}

const write = async (output: Writable, chunk: string): Promise<void> => {
  if (!output.write(chunk)) {
    await once(output, "drain");
  }
};

/**
 * Converts a whole input stream.
 *
 * JSON Lines input is converted line by line and blank lines are skipped;
 * the first failing line stops the conversion and its error carries the line
 * number. JSON input is read to the end and converted as one document. Every
 * output document is followed by a newline.
 */
export const convertStream = async (
  input: Readable,
  output: Writable,
  options: ConvertStreamOptions,
): Promise<Result<ConversionSummary, ConversionError>> => {
  const lines = createInterface({ input, crlfDelay: Infinity });
  const iterator = lines[Symbol.asyncIterator]();

  try {
    const first = await iterator.next();
    if (first.done === true) {
      return err({ type: "json" as const, message: "Invalid JSON: input is empty" });
    }
    const firstLine = first.value;

    const framing = detectFraming({
      firstLine,
      sourceName: options.sourceName,
      format: options.format,
    });
    options.logger?.debug("Detected input framing", { framing });

    if (framing === "json") {
      const rest: string[] = [firstLine];
      for await (const line of iterator) {
        rest.push(line);
      }
      const converted = convertText(rest.join("\n"), options);
      if (!converted.success) return converted;
      await write(output, `${converted.data}\n`);
      return ok({ framing, records: 1 });
    }

    let records = 0;
    let lineNumber = 1;
    let current: IteratorResult<string> = first;
    while (current.done !== true) {
      const text = current.value.trim();
      if (text !== "") {
        const converted = convertText(text, options);
        if (!converted.success) return err(atLine(converted.error, lineNumber));
        await write(output, `${converted.data}\n`);
        records += 1;
      }
      current = await iterator.next();
      lineNumber += 1;
    }
    options.logger?.debug("Converted JSON Lines input", { records });
    return ok({ framing, records });
  } catch (error) {
    return err({
      type: "io" as const,
      message: error instanceof Error ? error.message : String(error),
      cause: error,
    });
  } finally {
    lines.close();
  }
};
