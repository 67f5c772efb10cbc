import type { MatchOutcome } from "./types.js";

/**
 * Scores one query against one sort key.
 *
 * Contract notes:
 * - comparison is case-insensitive
 * - an empty query matches any key with score 0
 * - must be deterministic for a given (query, key) and score model
 */
export interface Matcher {
  evaluate(query: string, key: string): MatchOutcome;
}
