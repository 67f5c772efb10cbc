import { availableParallelism } from "node:os";
import { setImmediate as yieldToLoop } from "node:timers/promises";

import type { Candidates, MatchResult, Ranking } from "../types.js";
import type { Matcher } from "../matcher.js";
import type { AsyncRanker, RankOptions } from "../ranker.js";
import { scoreCandidate } from "./sequentialRanker.js";

export interface ChunkedRankerOptions {
  /** Number of worker units, each owning one contiguous index range. */
  units?: number;
  /** Candidates scored between two yields to the event loop. */
  chunkSize?: number;
}

/**
 * Ranks a collection with a fixed pool of worker units over index ranges.
 *
 * Each unit writes only its own slots of a pre-sized result array and yields
 * to the event loop every `chunkSize` candidates, so an abort from a newer
 * keystroke is seen promptly. The output is identical to SequentialRanker's.
 */
export class ChunkedRanker implements AsyncRanker {
  private readonly units: number;
  private readonly chunkSize: number;

  constructor(
    private readonly matcher: Matcher,
    opts: ChunkedRankerOptions = {},
  ) {
    this.units = Math.max(1, Math.floor(opts.units ?? availableParallelism()));
    this.chunkSize = Math.max(1, Math.floor(opts.chunkSize ?? 256));
  }

  async rank<T>(query: string, candidates: Candidates<T>, options?: RankOptions): Promise<Ranking> {
    const n = candidates.length;
    const out: Ranking = new Array<MatchResult>(n);
    options?.signal?.throwIfAborted();
    if (n === 0) return out;

    const units = Math.min(this.units, n);
    const span = Math.ceil(n / units);
    const work: Array<Promise<void>> = [];
    for (let start = 0; start < n; start += span) {
      work.push(this.runUnit(query, candidates, out, start, Math.min(n, start + span), options));
    }
    await Promise.all(work);
    return out;
  }

  private async runUnit<T>(
    query: string,
    candidates: Candidates<T>,
    out: Ranking,
    start: number,
    end: number,
    options?: RankOptions,
  ): Promise<void> {
    let sinceYield = 0;
    for (let i = start; i < end; i++) {
      if (sinceYield === this.chunkSize) {
        sinceYield = 0;
        await yieldToLoop();
      }
      options?.signal?.throwIfAborted();
      out[i] = scoreCandidate(this.matcher, query, candidates, i, options);
      sinceYield++;
    }
  }
}
