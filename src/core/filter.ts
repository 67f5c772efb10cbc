import type { Candidates, RankedHit, Ranking } from "./types.js";

/**
 * Turns a ranking into the ordered subset shown to the user.
 *
 * Contract notes:
 * - keeps only matching candidates, best score first
 * - equal scores keep collection order
 * - maxResults <= 0 means unbounded
 * - never mutates its inputs
 */
export interface Filter {
  selectHits<T>(candidates: Candidates<T>, ranking: Ranking, maxResults: number): RankedHit<T>[];
  select<T>(candidates: Candidates<T>, ranking: Ranking, maxResults: number): T[];
}
