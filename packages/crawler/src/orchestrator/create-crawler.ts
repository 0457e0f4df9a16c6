import type { Logger } from '@workspace/logger';
import type { AxiosAdapter } from 'axios';
import { AdaptiveRateController } from '../anti-blocking/adaptive-rate-controller.js';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import { charsetFromConfig, type CrawlConfig } from '../config/crawl-config.js';
import { AutocompleteClient } from '../lookup/autocomplete-client.js';
import { PrefixFetcher } from '../lookup/prefix-fetcher.js';
import { ErrorSnapshotWriter } from '../observability/error-snapshot.js';
import { CrawlMetrics } from '../observability/metrics.js';
import { CheckpointManager } from '../pipeline/checkpoint-manager.js';
import { CrawlState } from '../pipeline/crawl-state.js';
import type { Sleep } from '../utils/sleep.js';
import { NamespaceCrawler } from './crawler.js';

type CreateCrawlerOverrides = {
  adapter?: AxiosAdapter;
  sleep?: Sleep;
  random?: () => number;
  log?: Logger;
  handleSignals?: boolean;
};

/**
 * Wires a crawler from a validated config, resuming from the checkpoint at
 * `config.checkpointPath` when one loads.
 */
export function createNamespaceCrawler(
  config: CrawlConfig,
  overrides: CreateCrawlerOverrides = {},
): NamespaceCrawler {
  const charset = charsetFromConfig(config);
  const checkpoints = new CheckpointManager({
    path: config.checkpointPath,
    everyRequests: config.checkpointEveryRequests,
    intervalMs: config.checkpointIntervalMs,
  });

  const record = checkpoints.load();
  const state = record ? CrawlState.fromRecord(record) : new CrawlState();
  const metrics = new CrawlMetrics();

  const rateController = new AdaptiveRateController(
    {
      initialDelayMs: config.initialDelayMs,
      minDelayMs: config.minDelayMs,
      maxDelayMs: config.maxDelayMs,
    },
    { sleep: overrides.sleep },
  );

  const client = new AutocompleteClient({
    baseUrl: config.baseUrl,
    apiVersion: config.apiVersion,
    maxResults: config.maxResults,
    timeoutMs: config.requestTimeoutMs,
    maxSockets: config.workers,
    adapter: overrides.adapter,
  });

  const fetcher = new PrefixFetcher({
    client,
    maxResults: config.maxResults,
    retryStrategy: new RetryStrategy({ maxRetries: config.maxRetries }, overrides.random),
    rateController,
    recorder: state,
    metrics,
    requestJitterMs: config.requestJitterMs,
    random: overrides.random,
    sleep: overrides.sleep,
  });

  const snapshots = new ErrorSnapshotWriter({
    directory: config.abandonedDir,
    maxSnapshots: config.maxSnapshots,
  });

  return new NamespaceCrawler(
    {
      workers: config.workers,
      maxResults: config.maxResults,
      pollIntervalMs: config.pollIntervalMs,
      statusIntervalMs: config.statusIntervalMs,
      handleSignals: overrides.handleSignals ?? true,
    },
    {
      charset,
      state,
      fetcher,
      rateController,
      checkpoints,
      metrics,
      snapshots,
      log: overrides.log,
    },
  );
}

export type { CreateCrawlerOverrides };
