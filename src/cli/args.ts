import { z } from "zod";

import { UsageError } from "../core/errors.js";

export const NAME = "wordfreq";
export const VERSION = "0.1.0";

export type CliArgs =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "count"; file: string; top?: number };

const TopSchema = z.coerce.number().int().min(1);

function parseTop(raw: string | undefined): number {
  if (raw === undefined) throw new UsageError("option --top requires a value");
  const parsed = TopSchema.safeParse(raw.trim() === "" ? Number.NaN : raw);
  if (!parsed.success) throw new UsageError(`invalid --top value "${raw}": must be a positive integer`);
  return parsed.data;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let help = false;
  let version = false;
  let top: number | undefined;
  const positionals: string[] = [];
  let optionsDone = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (optionsDone || arg === "-" || !arg.startsWith("-")) {
      positionals.push(arg);
    } else if (arg === "--") {
      optionsDone = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--version" || arg === "-v") {
      version = true;
    } else if (arg === "--top" || arg === "-n") {
      top = parseTop(argv[++i]);
    } else if (arg.startsWith("--top=")) {
      top = parseTop(arg.slice("--top=".length));
    } else {
      throw new UsageError(`unknown option "${arg}"`);
    }
  }

  if (help) return { kind: "help" };
  if (version) return { kind: "version" };

  const [file, extra] = positionals;
  if (file === undefined) throw new UsageError("missing input file");
  if (extra !== undefined) throw new UsageError(`unexpected argument "${extra}"`);
  return top === undefined ? { kind: "count", file } : { kind: "count", file, top };
}

export function getHelpText(): string {
  return `
${NAME} - count whitespace-delimited tokens in a text file

USAGE:
  ${NAME} [options] <file>

OPTIONS:
  -h, --help                 Show this help message
  -v, --version              Show version information
  -n, --top <count>          Print only the <count> most frequent tokens

OUTPUT:
  One "<token>: <count>" line per distinct token. Without --top the order is unspecified.

ENVIRONMENT:
  LOG_LEVEL                  fatal|error|warn|info|debug|trace|silent (default: warn)
`.trim();
}
