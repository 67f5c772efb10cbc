import type { Candidates, RankedHit, Ranking } from "../types.js";
import type { AsyncRanker, RankOptions, Ranker } from "../ranker.js";
import type { Filter } from "../filter.js";
import type { ScoreOptions } from "../scoreModel.js";
import { logger, readableDuration } from "../../logging/logger.js";
import { AlignmentMatcher } from "./alignmentMatcher.js";
import { ChunkedRanker, type ChunkedRankerOptions } from "./chunkedRanker.js";
import { createScoreModel } from "./scoreModel.js";
import { SequentialRanker } from "./sequentialRanker.js";
import { StableFilter } from "./stableFilter.js";

const log = logger.child("fuzzy");

/** Both rankers usually share one matcher; the engine only talks to the rankers. */
export interface EngineDeps {
  ranker: Ranker;
  asyncRanker: AsyncRanker;
  filter: Filter;
}

export interface CreateEngineOptions {
  scoring?: ScoreOptions;
  chunking?: ChunkedRankerOptions;
}

/**
 * Fuzzy filter over one candidate collection.
 *
 * `sort` is the raw per-index ranking; `filter` ranks then selects.
 */
export class FuzzySearchEngine<T> {
  constructor(
    private readonly candidates: Candidates<T>,
    private readonly deps: EngineDeps,
  ) {}

  get size(): number {
    return this.candidates.length;
  }

  sort(query: string, options?: RankOptions): Ranking {
    return this.deps.ranker.rank(query, this.candidates, options);
  }

  filter(query: string, maxResults: number, options?: RankOptions): RankedHit<T>[] {
    const started = performance.now();
    const ranking = this.deps.ranker.rank(query, this.candidates, options);
    return this.finish(query, ranking, maxResults, started);
  }

  async filterAsync(query: string, maxResults: number, options?: RankOptions): Promise<RankedHit<T>[]> {
    const started = performance.now();
    const ranking = await this.deps.asyncRanker.rank(query, this.candidates, options);
    return this.finish(query, ranking, maxResults, started);
  }

  private finish(query: string, ranking: Ranking, maxResults: number, started: number): RankedHit<T>[] {
    const hits = this.deps.filter.selectHits(this.candidates, ranking, maxResults);

    if (log.isLevelEnabled("debug")) {
      hits.forEach((h, n) => log.debug("hit", { rank: n + 1, score: Number(h.score.toFixed(2)), index: h.index }));
      log.debug("filtered candidates", {
        query,
        candidates: this.candidates.length,
        matched: hits.length,
        took: readableDuration(performance.now() - started),
      });
    }
    return hits;
  }
}

/** Wires the default matcher, rankers and filter. Throws ConfigurationError on bad weights. */
export function createFuzzySearchEngine<T>(candidates: Candidates<T>, options: CreateEngineOptions = {}): FuzzySearchEngine<T> {
  const matcher = new AlignmentMatcher(createScoreModel(options.scoring));
  return new FuzzySearchEngine(candidates, {
    ranker: new SequentialRanker(matcher),
    asyncRanker: new ChunkedRanker(matcher, options.chunking),
    filter: new StableFilter(),
  });
}
