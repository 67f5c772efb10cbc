export { AlignmentMatcher } from "./alignmentMatcher.js";
export { ChunkedRanker, type ChunkedRankerOptions } from "./chunkedRanker.js";
export { FuzzySearchEngine, createFuzzySearchEngine, type CreateEngineOptions, type EngineDeps } from "./fuzzySearchEngine.js";
export { ArrayHeap, MinHeapTopKSelector } from "./minHeapTopK.js";
export { createScoreModel } from "./scoreModel.js";
export { SequentialRanker, scoreCandidate } from "./sequentialRanker.js";
export { StableFilter, compareResults } from "./stableFilter.js";
