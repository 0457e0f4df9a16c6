export { NamespaceCrawler } from "./orchestrator/crawler.js";
export {
  createNamespaceCrawler,
  type CreateCrawlerOverrides
} from "./orchestrator/create-crawler.js";
export type {
  CrawlSummary,
  NamespaceCrawlerConfig,
  NamespaceCrawlerDeps,
  PrefixLookup
} from "./orchestrator/types.js";
export { Charset, DIGITS, LOWERCASE, PUNCTUATION } from "./charset/charset.js";
export type { CharsetOrder, CharsetPreset, CharsetTier } from "./charset/types.js";
export {
  expandPrefix,
  PRIMARY_BRANCH_OFFSET,
  SPECIAL_BRANCH_OFFSET
} from "./expansion/expand-prefix.js";
export type { ChildEnqueue, ExpansionResult } from "./expansion/types.js";
export { Frontier } from "./queue/frontier.js";
export type { FrontierSeed, QueueItem } from "./queue/types.js";
export { AdaptiveRateController } from "./anti-blocking/adaptive-rate-controller.js";
export { RetryStrategy } from "./anti-blocking/retry-strategy.js";
export type { ErrorClass, RetryDecision } from "./anti-blocking/types.js";
export { AutocompleteClient } from "./lookup/autocomplete-client.js";
export { PrefixFetcher } from "./lookup/prefix-fetcher.js";
export { AutocompleteNetworkError } from "./lookup/errors.js";
export type { LookupClient, LookupOutcome } from "./lookup/types.js";
export {
  CheckpointManager,
  rebuildFrontier,
  rootSeeds
} from "./pipeline/checkpoint-manager.js";
export { CrawlState } from "./pipeline/crawl-state.js";
export { ResultWriter } from "./pipeline/result-writer.js";
export { CheckpointStorageError } from "./pipeline/errors.js";
export type { CheckpointRecord, CrawlOutput } from "./pipeline/types.js";
export {
  crawlConfigSchema,
  resolveCrawlConfig,
  type CrawlConfig
} from "./config/crawl-config.js";
