import type { FrequencyEntry, LineSink } from "../types.js";
import type { Emitter } from "../emitter.js";

export const DEFAULT_SEPARATOR = ": ";

export function formatEntry(entry: FrequencyEntry, separator: string = DEFAULT_SEPARATOR): string {
  return `${entry.term}${separator}${entry.count}`;
}

/** Emits `<token>: <count>` lines. */
export class LineEmitter implements Emitter {
  constructor(private readonly separator: string = DEFAULT_SEPARATOR) {}

  emit(entries: Iterable<FrequencyEntry>, sink: LineSink): number {
    let written = 0;
    for (const entry of entries) {
      sink(formatEntry(entry, this.separator));
      written++;
    }
    return written;
  }
}
