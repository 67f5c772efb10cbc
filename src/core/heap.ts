/**
 * Binary heap contract. `peek` returns the item the ordering puts first.
 */
export interface Heap<T> {
  readonly size: number;
  peek(): T | undefined;
  push(item: T): void;
  /** Replaces the top item and restores heap order. */
  replaceTop(item: T): T | undefined;
}

export interface TopKSelector<T> {
  /**
   * Returns the first k items of `items` under `comparator`, already sorted.
   * Comparator follows Array.sort semantics: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
