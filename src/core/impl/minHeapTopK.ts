import type { Ranking, TopKSelector } from "../ranking.js";

/** Binary heap over an array; the root is the item `less` puts first. */
class ArrayHeap<T> {
  private readonly data: T[] = [];

  /** `less(a, b)` true means a sits closer to the root than b. */
  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    let i = this.data.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (this.data.length && last !== undefined) {
      this.data[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /** Heap order, not sorted. */
  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(i: number): void {
    const n = this.data.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let smallest = i;

      if (l < n && this.before(l, smallest)) smallest = l;
      if (r < n && this.before(r, smallest)) smallest = r;
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }

  private before(i: number, j: number): boolean {
    const a = this.data[i];
    const b = this.data[j];
    return a !== undefined && b !== undefined && this.less(a, b);
  }

  private swap(i: number, j: number): void {
    const a = this.data[i];
    const b = this.data[j];
    if (a === undefined || b === undefined) return;
    this.data[i] = b;
    this.data[j] = a;
  }
}

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0). "Best" means first in comparator order,
 * so the heap keeps the *worst of the best* at the top and evicts it when something better arrives.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Ranking<T>): T[] {
    if (k <= 0) return [];

    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.toArray().sort(comparator);
  }
}
