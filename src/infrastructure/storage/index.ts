/**
 * Storage Infrastructure
 *
 * Handles persistence of the summary cache and summary document.
 */

export { InMemorySummaryCache } from "./summaryCache";
export type { SummaryCacheOptions } from "./summaryCache";
export { CacheStorage, parseSnapshot } from "./cacheStorage";
