/**
 * ddb-json CLI (Commander-based)
 *
 *   ddb-json from-ddb [-i in.json] [-o out.json] [--pretty] [--root item|value]
 *   ddb-json to-ddb   [-i in.json] [-o out.json] [--pretty] [--without-item]
 *
 * Reads stdin and writes stdout unless files are given. Input may be one
 * JSON document or JSON Lines; see `detectFraming`.
 */

import { once } from "node:events";
import { createReadStream, createWriteStream } from "node:fs";
import type { Readable, Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { Command, CommanderError } from "commander";
import { type Result, ok, err } from "../types/common.js";
import { type LogSink, createLogger, defaultLogLevel } from "../utils/logger.js";
import { convertStream } from "./convert.js";
import { type CliOptions, resolveCliOptions } from "./options.js";

const pkg = {
  name: "ddb-json",
  version: "0.1.0",
  description: "Convert between DynamoDB JSON and normal JSON formats",
};

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Streams and environment the CLI runs against. */
export interface CliIo {
  readonly stdin: Readable;
  readonly stdout: Writable;
  readonly stderr: Writable & LogSink;
  readonly env: Readonly<Record<string, string | undefined>>;
}

export const processIo = (): CliIo => ({
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
});

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const openStream = async <S extends Readable | Writable>(
  stream: S,
  failure: string,
): Promise<Result<S, string>> => {
  try {
    await once(stream, "open");
    return ok(stream);
  } catch (error) {
    stream.destroy();
    return err(`${failure}: ${describeError(error)}`);
  }
};

const openStreams = async (
  options: CliOptions,
  io: CliIo,
): Promise<Result<{ readonly input: Readable; readonly output: Writable }, string>> => {
  const input =
    options.input === undefined
      ? ok<Readable>(io.stdin)
      : await openStream(
          createReadStream(options.input),
          `Error opening input file '${options.input}'`,
        );
  if (!input.success) return input;

  const output =
    options.output === undefined
      ? ok<Writable>(io.stdout)
      : await openStream(
          createWriteStream(options.output),
          `Error creating output file '${options.output}'`,
        );
  if (!output.success) {
    if (input.data !== io.stdin) input.data.destroy();
    return output;
  }
  return ok({ input: input.data, output: output.data });
};

const fail = (io: CliIo, message: string): ExitCode => {
  io.stderr.write(`Error: ${message}\n`);
  return ExitCode.ERROR;
};

const runConversion = async (
  options: CliOptions,
  io: CliIo,
): Promise<ExitCode> => {
  const logger = createLogger("ddb-json", {
    level: options.verbose ? "debug" : defaultLogLevel(io.env),
    sink: io.stderr,
  });

  const streams = await openStreams(options, io);
  if (!streams.success) {
    return fail(io, streams.error);
  }
  const { input, output } = streams.data;

  const result = await convertStream(input, output, {
    mode: options.mode,
    wrapItem: !options.withoutItem,
    root: options.root,
    pretty: options.pretty,
    format: options.format,
    sourceName: options.input,
    logger,
  });

  if (input !== io.stdin) input.destroy();
  if (output !== io.stdout) {
    output.end();
    await finished(output);
  }

  if (!result.success) {
    logger.debug("Conversion failed", { type: result.error.type, line: result.error.line });
    return fail(io, result.error.message);
  }
  logger.debug("Conversion finished", {
    framing: result.data.framing,
    records: result.data.records,
  });
  return ExitCode.SUCCESS;
};

/**
 * Builds the Commander program. `onExit` receives the exit code of a
 * conversion run.
 */
export const createProgram = (
  io: CliIo,
  onExit: (code: ExitCode) => void,
): Command =>
  new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, "-v, --version", "Show version number")
    .argument("<mode>", "Conversion mode: from-ddb or to-ddb")
    .option("-i, --input <file>", "Input file (stdin if not specified)")
    .option("-o, --output <file>", "Output file (stdout if not specified)")
    .option("-p, --pretty", "Pretty print output JSON")
    .option("--without-item", 'Omit top-level "Item" wrapper (only applies to to-ddb mode)')
    .option("--root <shape>", "Root of from-ddb input: item or value", "item")
    .option("--format <format>", "Input framing: auto, json or jsonl", "auto")
    .option("--verbose", "Log diagnostics to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .action(async (mode: string, flags: Record<string, unknown>) => {
      const options = await resolveCliOptions({ ...flags, mode });
      if (!options.success) {
        io.stderr.write(`Error: ${options.error.message}\n`);
        onExit(ExitCode.MISUSE);
        return;
      }
      onExit(await runConversion(options.data, io));
    });

/**
 * Runs the CLI and resolves with its exit code.
 *
 * @param argv - Arguments after the executable and script name
 */
export const runCli = async (
  argv: readonly string[],
  io: CliIo = processIo(),
): Promise<ExitCode> => {
  let exitCode: ExitCode = ExitCode.SUCCESS;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.MISUSE;
    }
    throw error;
  }
  return exitCode;
};
