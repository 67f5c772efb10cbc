import type { Candidates, MatchResult, RankedHit, Ranking } from "../types.js";
import type { Filter } from "../filter.js";
import type { TopKSelector } from "../heap.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

/** Score descending, then original index ascending. A total order, hence stable. */
export function compareResults(a: MatchResult, b: MatchResult): number {
  return b.score - a.score || a.index - b.index;
}

export class StableFilter implements Filter {
  constructor(private readonly topK: TopKSelector<MatchResult> = new MinHeapTopKSelector<MatchResult>()) {}

  selectHits<T>(candidates: Candidates<T>, ranking: Ranking, maxResults: number): RankedHit<T>[] {
    if (ranking.length !== candidates.length) {
      throw new RangeError(`ranking has ${ranking.length} entries for ${candidates.length} candidates`);
    }

    const matches = ranking.filter((r) => r.match);
    const ordered =
      maxResults > 0 && maxResults < matches.length
        ? this.topK.topK(matches, maxResults, compareResults)
        : matches.sort(compareResults);

    return ordered.map((r) => ({ index: r.index, score: r.score, item: candidates.item(r.index) }));
  }

  select<T>(candidates: Candidates<T>, ranking: Ranking, maxResults: number): T[] {
    return this.selectHits(candidates, ranking, maxResults).map((h) => h.item);
  }
}
