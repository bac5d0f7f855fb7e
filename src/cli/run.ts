import type { LineSink } from "../core/types.js";
import { exitCodeFor, toWordFreqError } from "../core/errors.js";
import { FileSource, createWordFrequencyCounter, type WordFrequencyCounter } from "../core/impl/index.js";
import { loadEnv } from "../config/env.js";
import { createLogger, type Logger } from "../config/logger.js";
import { NAME, VERSION, getHelpText, parseCliArgs } from "./args.js";

export interface CliIo {
  stdout: LineSink;
  stderr: LineSink;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** Replaces the logger built from `LOG_LEVEL`. */
  logger?: Logger;
  counter?: WordFrequencyCounter;
}

/**
 * Runs one CLI invocation and returns the process exit status.
 *
 * Nothing reaches stdout unless the input was read in full.
 */
export function run(argv: readonly string[], io: CliIo, opts: RunOptions = {}): number {
  let logger = opts.logger;

  try {
    const env = loadEnv(opts.env ?? process.env);
    logger ??= createLogger(env);

    const args = parseCliArgs(argv);
    if (args.kind === "help") {
      for (const line of getHelpText().split("\n")) io.stdout(line);
      return 0;
    }
    if (args.kind === "version") {
      io.stdout(`${NAME} ${VERSION}`);
      return 0;
    }

    const counter = opts.counter ?? createWordFrequencyCounter();
    const source = new FileSource(args.file);
    const table = counter.countSource(source);
    logger.debug({ source: source.name, tokens: table.total(), distinct: table.size() }, "counted tokens");

    const lines = counter.emit(table, io.stdout, { top: args.top });
    logger.debug({ lines }, "emitted table");
    return 0;
  } catch (e) {
    const err = toWordFreqError(e);
    logger?.debug({ err, code: err.code, title: err.title }, "run failed");

    io.stderr(`${NAME}: ${err.message}`);
    if (err.code === "INVALID_ARGUMENT") io.stderr(`Try '${NAME} --help' for more information.`);
    return exitCodeFor(err);
  }
}
