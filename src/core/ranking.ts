import type { FrequencyEntry } from "./types.js";

/** Array.sort semantics: <0 means `a` ranks above `b`. */
export type Ranking<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /** The `k` highest-ranked items, highest first. Empty for k <= 0. */
  topK(items: Iterable<T>, k: number, ranking: Ranking<T>): T[];
}

/**
 * Order used by `--top`: higher count first; equal counts by term in UTF-16 code-unit order
 * (so "B" ranks above "a"). Never returns 0 for two entries of one table, since terms are unique.
 */
export const byFrequency: Ranking<FrequencyEntry> = (a, b) =>
  b.count - a.count || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0);
