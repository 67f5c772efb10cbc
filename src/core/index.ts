export * from "./types.js";
export * from "./errors.js";
export * from "./scoreModel.js";
export type { Matcher } from "./matcher.js";
export type { AsyncRanker, RankOptions, Ranker } from "./ranker.js";
export type { Filter } from "./filter.js";
export type { Heap, TopKSelector } from "./heap.js";
export * from "./impl/index.js";
