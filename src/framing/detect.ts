/**
 * Decides whether an input is one JSON document or JSON Lines.
 */

import { parseJson } from "../json/parse.js";

/** `json`: one document. `jsonl`: one document per non-blank line. */
export type InputFraming = "json" | "jsonl";

/**
 * True if `probeText` is a complete JSON value on its own.
 *
 * Blank text is not. Applied to the first line of an input, a `true` answer
 * means the input is JSON Lines; a document spread over several lines fails
 * to parse from its first line alone.
 */
export const looksLikeSingleJsonValue = (probeText: string): boolean => {
  const trimmed = probeText.trim();
  if (trimmed === "") return false;
  return parseJson(trimmed).success;
};

export interface DetectFramingInput {
  /** First line of the input, without its line terminator. */
  readonly firstLine: string;
  /** File name the input came from, if any. */
  readonly sourceName?: string | undefined;
  /** Framing requested by the caller. `auto` (the default) probes. */
  readonly format?: InputFraming | "auto" | undefined;
}

/**
 * Picks the framing for an input.
 *
 * An explicit `format` wins, then a `.jsonl` file extension, then the
 * first-line probe.
 */
export const detectFraming = ({
  firstLine,
  sourceName,
  format = "auto",
}: DetectFramingInput): InputFraming => {
  if (format !== "auto") return format;
  if (sourceName?.toLowerCase().endsWith(".jsonl") === true) return "jsonl";
  return looksLikeSingleJsonValue(firstLine) ? "jsonl" : "json";
};
