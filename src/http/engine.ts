import {
  createFuzzySearchEngine,
  type FuzzySearchEngine,
  type ScoreOptions,
} from "../core/index.js";
import { catalogCandidates, toItem, warningItem, type CatalogEntry, type Item } from "./catalog.js";

export interface FilterQuery {
  query: string;
  /** 0 means unbounded. */
  maxResults: number;
  /** Searched instead of the loaded catalog when present. */
  candidates?: CatalogEntry[];
  /** Weight overrides for this request only. */
  scoring?: ScoreOptions;
  signal?: AbortSignal;
}

export interface FilterResponse {
  items: Item[];
  total: number;
  matched: number;
}

export interface Engine {
  readonly size: number;
  filter(q: FilterQuery): Promise<FilterResponse>;
}

export function createCatalogEngine(entries: readonly CatalogEntry[], scoring: ScoreOptions = {}): Engine {
  const catalog = createFuzzySearchEngine(catalogCandidates(entries), { scoring });

  return {
    get size() {
      return catalog.size;
    },
    async filter(q) {
      let engine: FuzzySearchEngine<CatalogEntry> = catalog;
      if (q.candidates || q.scoring) {
        engine = createFuzzySearchEngine(catalogCandidates(q.candidates ?? entries), {
          scoring: { ...scoring, ...q.scoring },
        });
      }

      const hits = await engine.filterAsync(q.query, q.maxResults, { signal: q.signal });
      const items = hits.map((h) => toItem(h.item));

      if (items.length === 0) {
        items.push(
          q.query === "" ? warningItem("No items", "") : warningItem("No matching items", "Try a different query?"),
        );
      }
      return { items, total: engine.size, matched: hits.length };
    },
  };
}
