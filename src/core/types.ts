/** Shared core types used by module contracts. */

/**
 * A collection the engine can rank.
 *
 * The engine never looks at the elements themselves, only at the sort key
 * derived for each index.
 */
export interface Candidates<T> {
  readonly length: number;
  sortKey(index: number): string;
  item(index: number): T;
}

export interface MatchOutcome {
  matched: boolean;
  /** 0 when `matched` is false. */
  score: number;
}

export interface MatchResult {
  /** Position in the original collection. */
  index: number;
  score: number;
  match: boolean;
}

/** One MatchResult per candidate, in collection order. */
export type Ranking = MatchResult[];

export interface RankedHit<T> {
  index: number;
  score: number;
  item: T;
}

/** Adapts a plain array to {@link Candidates}. */
export function arrayCandidates<T>(items: readonly T[], keyOf: (item: T) => string): Candidates<T> {
  return {
    length: items.length,
    sortKey(index) {
      return keyOf(itemAt(items, index));
    },
    item(index) {
      return itemAt(items, index);
    },
  };
}

function itemAt<T>(items: readonly T[], index: number): T {
  if (index < 0 || index >= items.length) {
    throw new RangeError(`index ${index} out of range [0, ${items.length})`);
  }
  return items[index]!;
}
