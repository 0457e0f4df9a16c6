import type { Logger } from '@workspace/logger';
import type { AdaptiveRateController } from '../anti-blocking/adaptive-rate-controller.js';
import type { Charset } from '../charset/charset.js';
import type { LookupOutcome } from '../lookup/types.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import type { ErrorSnapshotWriter } from '../observability/error-snapshot.js';
import type { CheckpointManager } from '../pipeline/checkpoint-manager.js';
import type { CrawlState } from '../pipeline/crawl-state.js';

interface PrefixLookup {
  fetch(prefix: string): Promise<LookupOutcome>;
}

type NamespaceCrawlerConfig = {
  workers: number;
  maxResults: number;
  pollIntervalMs: number;
  statusIntervalMs: number;
  handleSignals: boolean;
};

type NamespaceCrawlerDeps = {
  charset: Charset;
  state: CrawlState;
  fetcher: PrefixLookup;
  rateController: AdaptiveRateController;
  checkpoints: CheckpointManager;
  metrics: CrawlMetrics;
  snapshots?: ErrorSnapshotWriter;
  log?: Logger;
};

type CrawlSummary = {
  totalRequests: number;
  totalNames: number;
  names: string[];
  exploredPrefixes: number;
  interrupted: boolean;
  durationMs: number;
};

export type {
  PrefixLookup,
  NamespaceCrawlerConfig,
  NamespaceCrawlerDeps,
  CrawlSummary,
};
