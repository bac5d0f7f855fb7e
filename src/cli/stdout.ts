import type { LineSink } from "../core/types.js";
import { systemErrorCode, toWordFreqError } from "../core/errors.js";
import { NAME } from "./args.js";

/** A reader closing the pipe early (`wordfreq f | head -1`) just ends the output. */
export function isBrokenPipe(e: unknown): boolean {
  return systemErrorCode(e) === "EPIPE";
}

/** Exit status after stdout failed asynchronously; reports anything but a broken pipe. */
export function stdoutErrorStatus(e: unknown, stderr: LineSink): number {
  if (isBrokenPipe(e)) return 0;
  stderr(`${NAME}: ${toWordFreqError(e).message}`);
  return 1;
}
