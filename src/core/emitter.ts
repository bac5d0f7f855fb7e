import type { FrequencyEntry, LineSink } from "./types.js";

export interface Emitter {
  /** Writes one line per entry and returns the number of lines written. */
  emit(entries: Iterable<FrequencyEntry>, sink: LineSink): number;
}
