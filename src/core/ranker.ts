import type { Candidates, Ranking } from "./types.js";
import type { KeyDerivationError } from "./errors.js";

export interface RankOptions {
  /** Checked between candidates; an aborted signal throws its reason. */
  signal?: AbortSignal;
  /** Receives per-candidate key failures. Defaults to a warn log line. */
  onKeyError?: (err: KeyDerivationError) => void;
}

/**
 * Scores every candidate against a query.
 *
 * The returned ranking has one entry per candidate, in collection order;
 * ranking[i].index === i.
 */
export interface Ranker {
  rank<T>(query: string, candidates: Candidates<T>, options?: RankOptions): Ranking;
}

export interface AsyncRanker {
  rank<T>(query: string, candidates: Candidates<T>, options?: RankOptions): Promise<Ranking>;
}
