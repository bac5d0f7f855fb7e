import type { FrequencyEntry, Term } from "../types.js";
import type { FrequencyTable } from "../frequencyTable.js";

/**
 * In-memory frequency table backed by a Map.
 *
 * `entries()` yields terms in first-encounter order; callers must not rely on it.
 */
export class MemoryFrequencyTable implements FrequencyTable {
  private readonly counts = new Map<Term, number>();
  private sum = 0;

  increment(term: Term, by: number = 1): number {
    if (!Number.isInteger(by) || by < 1) {
      throw new RangeError(`increment must be a positive integer, got ${by}`);
    }
    const next = (this.counts.get(term) ?? 0) + by;
    this.counts.set(term, next);
    this.sum += by;
    return next;
  }

  get(term: Term): number {
    return this.counts.get(term) ?? 0;
  }

  has(term: Term): boolean {
    return this.counts.has(term);
  }

  size(): number {
    return this.counts.size;
  }

  total(): number {
    return this.sum;
  }

  *entries(): Iterable<FrequencyEntry> {
    for (const [term, count] of this.counts) yield { term, count };
  }
}
