import { readFileSync } from "node:fs";
import { TextDecoder } from "node:util";

import { InputReadError } from "../errors.js";
import type { TextSource } from "../source.js";

/**
 * Reads a whole file as UTF-8.
 *
 * Malformed byte sequences are a read failure, not U+FFFD replacements. A leading BOM is kept.
 */
export class FileSource implements TextSource {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

  constructor(readonly path: string) {}

  get name(): string {
    return this.path;
  }

  read(): string {
    try {
      return this.decoder.decode(readFileSync(this.path));
    } catch (e) {
      throw new InputReadError(this.path, e);
    }
  }
}
