/** Shared core types used by module contracts. */

export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  startOffset: number;
  endOffset: number;
}

export interface FrequencyEntry {
  term: Term;
  count: number;
}

/** Receives output one line at a time, without the trailing newline. */
export type LineSink = (line: string) => void;
