import type { Candidates, MatchResult, Ranking } from "../types.js";
import type { Matcher } from "../matcher.js";
import type { RankOptions, Ranker } from "../ranker.js";
import { KeyDerivationError } from "../errors.js";
import { logger } from "../../logging/logger.js";

const log = logger.child("ranker");

function reportKeyError(err: KeyDerivationError): void {
  log.warn("sort key unavailable, treating candidate as non-matching", { index: err.index }, err.cause);
}

/**
 * Scores a single candidate. Key failures are isolated: they are reported and
 * the candidate comes back as a non-match.
 */
export function scoreCandidate<T>(
  matcher: Matcher,
  query: string,
  candidates: Candidates<T>,
  index: number,
  options?: RankOptions,
): MatchResult {
  let key: string;
  try {
    key = candidates.sortKey(index);
  } catch (e) {
    (options?.onKeyError ?? reportKeyError)(new KeyDerivationError(index, e));
    return { index, score: 0, match: false };
  }

  const { matched, score } = matcher.evaluate(query, key);
  return { index, score: matched ? score : 0, match: matched };
}

export class SequentialRanker implements Ranker {
  constructor(private readonly matcher: Matcher) {}

  rank<T>(query: string, candidates: Candidates<T>, options?: RankOptions): Ranking {
    const n = candidates.length;
    const out: Ranking = new Array<MatchResult>(n);

    for (let i = 0; i < n; i++) {
      options?.signal?.throwIfAborted();
      out[i] = scoreCandidate(this.matcher, query, candidates, i, options);
    }
    return out;
  }
}
