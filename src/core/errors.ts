export type ErrorCode = "INPUT_READ" | "INVALID_ARGUMENT" | "INVALID_CONFIG" | "INTERNAL";

export class WordFreqError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WordFreqError";
    this.code = code;
  }

  get title(): string {
    return codeToTitle(this.code);
  }
}

/** The designated input could not be opened or fully read. */
export class InputReadError extends WordFreqError {
  readonly path: string;
  /** System error code such as ENOENT, when the failure carried one. */
  readonly errno?: string;

  constructor(path: string, cause: unknown) {
    const errno = systemErrorCode(cause);
    super("INPUT_READ", `cannot read "${path}"${errno ? ` (${errno})` : ""}`, { cause });
    this.name = "InputReadError";
    this.path = path;
    this.errno = errno;
  }
}

export class UsageError extends WordFreqError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "UsageError";
  }
}

export class ConfigError extends WordFreqError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

export function toWordFreqError(e: unknown): WordFreqError {
  if (e instanceof WordFreqError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new WordFreqError("INTERNAL", message, { cause: e });
}

export function exitCodeFor(err: WordFreqError): number {
  switch (err.code) {
    case "INVALID_ARGUMENT":
    case "INVALID_CONFIG":
      return 2;
    default:
      return 1;
  }
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "INPUT_READ":
      return "Input read error";
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INVALID_CONFIG":
      return "Invalid configuration";
    default:
      return "Internal error";
  }
}

/** `code` of a Node system error (ENOENT, EPIPE, ...), if the value carries one. */
export function systemErrorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}
