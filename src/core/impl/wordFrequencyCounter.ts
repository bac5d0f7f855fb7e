import type { FrequencyEntry, LineSink } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { FrequencyTable } from "../frequencyTable.js";
import type { Emitter } from "../emitter.js";
import { byFrequency, type TopKSelector } from "../ranking.js";
import type { TextSource } from "../source.js";
import { WhitespaceTokenizer } from "./whitespaceTokenizer.js";
import { MemoryFrequencyTable } from "./memoryFrequencyTable.js";
import { LineEmitter } from "./lineEmitter.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

export interface EmitOptions {
  /** If set, emit only the `top` most frequent entries, most frequent first. */
  top?: number;
}

export interface CounterDeps {
  tokenizer: Tokenizer;
  createTable: () => FrequencyTable;
  emitter: Emitter;
  topK: TopKSelector<FrequencyEntry>;
}

/**
 * tokenize -> count -> emit, in a single synchronous pass.
 *
 * Every call to `count` builds a fresh table; the counter itself holds no state between runs.
 */
export class WordFrequencyCounter {
  constructor(private readonly deps: CounterDeps) {}

  count(text: string): FrequencyTable {
    const table = this.deps.createTable();
    for (const tok of this.deps.tokenizer.tokenize(text)) {
      table.increment(tok.term);
    }
    return table;
  }

  /** Reads the whole source first; read failures propagate untouched. */
  countSource(source: TextSource): FrequencyTable {
    return this.count(source.read());
  }

  emit(table: FrequencyTable, sink: LineSink, options?: EmitOptions): number {
    const top = options?.top;
    if (top === undefined) return this.deps.emitter.emit(table.entries(), sink);
    return this.deps.emitter.emit(this.deps.topK.topK(table.entries(), top, byFrequency), sink);
  }
}

export function createWordFrequencyCounter(): WordFrequencyCounter {
  return new WordFrequencyCounter({
    tokenizer: new WhitespaceTokenizer(),
    createTable: () => new MemoryFrequencyTable(),
    emitter: new LineEmitter(),
    topK: new MinHeapTopKSelector<FrequencyEntry>(),
  });
}
