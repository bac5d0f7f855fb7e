import type { FrequencyEntry, Term } from "./types.js";

/**
 * Mapping term -> occurrence count.
 *
 * Contract notes:
 * - `total()` is always the sum of every count in the table
 * - `entries()` order is implementation-defined
 */
export interface FrequencyTable {
  /** Adds `by` (default 1) to the term's count and returns the new count. */
  increment(term: Term, by?: number): number;
  /** 0 for unseen terms. */
  get(term: Term): number;
  has(term: Term): boolean;

  /** Number of distinct terms. */
  size(): number;
  total(): number;

  entries(): Iterable<FrequencyEntry>;
}
