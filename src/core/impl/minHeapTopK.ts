import type { Heap, TopKSelector } from "../heap.js";

export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  /** `before(a, b)` is true when a belongs above b. */
  constructor(private readonly before: (a: T, b: T) => boolean) {}

  get size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  replaceTop(item: T): T | undefined {
    const a = this.data;
    if (a.length === 0) {
      a.push(item);
      return undefined;
    }
    const top = a[0];
    a[0] = item;
    this.siftDown(0);
    return top;
  }

  drain(): T[] {
    return this.data.splice(0, this.data.length);
  }

  private siftUp(i: number): void {
    const a = this.data;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(a[i]!, a[p]!)) break;
      [a[i], a[p]] = [a[p]!, a[i]!];
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let top = i;

      if (l < n && this.before(a[l]!, a[top]!)) top = l;
      if (r < n && this.before(a[r]!, a[top]!)) top = r;
      if (top === i) return;

      [a[i], a[top]] = [a[top]!, a[i]!];
      i = top;
    }
  }
}

/**
 * Keeps the best k items seen so far in a heap whose top is the worst of
 * them, so each new item costs one comparison unless it displaces the top.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) heap.replaceTop(item);
    }

    return heap.drain().sort(comparator);
  }
}
