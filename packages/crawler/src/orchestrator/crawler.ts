import { createLogger, type Logger } from '@workspace/logger';
import type { AdaptiveRateController } from '../anti-blocking/adaptive-rate-controller.js';
import type { Charset } from '../charset/charset.js';
import { expandPrefix } from '../expansion/expand-prefix.js';
import type { LookupFailure } from '../lookup/types.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import type { ErrorSnapshotWriter } from '../observability/error-snapshot.js';
import {
  rebuildFrontier,
  rootSeeds,
  type CheckpointManager,
} from '../pipeline/checkpoint-manager.js';
import type { CrawlState } from '../pipeline/crawl-state.js';
import { CheckpointStorageError } from '../pipeline/errors.js';
import { Frontier } from '../queue/frontier.js';
import type { QueueItem } from '../queue/types.js';
import type {
  CrawlSummary,
  NamespaceCrawlerConfig,
  NamespaceCrawlerDeps,
  PrefixLookup,
} from './types.js';

/**
 * Enumerates the service's namespace with a fixed pool of async workers
 * sharing one frontier, one state and one rate controller.
 *
 * Workers exit once the frontier is drained (nothing queued, nothing being
 * worked on) or after `requestShutdown`; either way a final checkpoint is
 * saved before `run` resolves.
 */
export class NamespaceCrawler {
  readonly state: CrawlState;
  private readonly config: NamespaceCrawlerConfig;
  private readonly charset: Charset;
  private readonly fetcher: PrefixLookup;
  private readonly rateController: AdaptiveRateController;
  private readonly checkpoints: CheckpointManager;
  private readonly metrics: CrawlMetrics;
  private readonly snapshots: ErrorSnapshotWriter | undefined;
  private readonly log: Logger;
  private readonly frontier: Frontier;
  private readonly inFlight: Set<string>;
  private shutdownRequested: boolean;
  private fatalError: CheckpointStorageError | undefined;
  private startedAt: number;

  constructor(config: NamespaceCrawlerConfig, deps: NamespaceCrawlerDeps) {
    this.config = config;
    this.state = deps.state;
    this.charset = deps.charset;
    this.fetcher = deps.fetcher;
    this.rateController = deps.rateController;
    this.checkpoints = deps.checkpoints;
    this.metrics = deps.metrics;
    this.snapshots = deps.snapshots;
    this.log = deps.log ?? createLogger('Crawler');
    this.frontier = new Frontier();
    this.inFlight = new Set();
    this.shutdownRequested = false;
    this.fatalError = undefined;
    this.startedAt = performance.now();
  }

  get frontierSize(): number {
    return this.frontier.size;
  }

  requestShutdown(): void {
    if (this.shutdownRequested) {
      return;
    }

    this.shutdownRequested = true;
    this.log.warn('Shutdown requested, finishing in-flight prefixes');
    this.frontier.close();
  }

  async run(): Promise<CrawlSummary> {
    this.startedAt = performance.now();
    this.seed();
    this.checkpoints.begin(this.state.requestCount);
    this.snapshots?.initialize();

    this.log.info(
      `Starting crawl with ${this.config.workers} workers, ${this.charset.size} characters (${this.charset.describe()})`,
    );

    const onShutdown = () => {
      this.requestShutdown();
    };
    if (this.config.handleSignals) {
      process.on('SIGINT', onShutdown);
      process.on('SIGTERM', onShutdown);
    }

    const statusInterval = setInterval(() => {
      this.logStatus();
    }, this.config.statusIntervalMs);

    try {
      await Promise.all(
        Array.from({ length: this.config.workers }, () => this.runWorker()),
      );
    } finally {
      clearInterval(statusInterval);
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onShutdown);
        process.removeListener('SIGTERM', onShutdown);
      }
    }

    if (this.fatalError) {
      this.log.fatal(this.fatalError.message);
      throw this.fatalError;
    }

    this.checkpoints.save(this.state);

    const durationMs = performance.now() - this.startedAt;
    this.logStatus();
    this.metrics.log(this.log);
    this.log.info(
      `${this.shutdownRequested ? 'Crawl interrupted' : 'Crawl complete'}: ${this.state.nameCount} names from ${this.state.requestCount} requests in ${(durationMs / 1000).toFixed(1)}s`,
    );

    return {
      totalRequests: this.state.requestCount,
      totalNames: this.state.nameCount,
      names: this.state.sortedNames(),
      exploredPrefixes: this.state.exploredCount,
      interrupted: this.shutdownRequested,
      durationMs,
    };
  }

  private seed(): void {
    const explored = this.state.exploredPrefixes;

    if (explored.size > 0) {
      const rebuilt = this.frontier.pushAll(rebuildFrontier(explored, this.charset));
      this.log.info(
        `Checkpoint loaded with ${this.state.nameCount} names and ${explored.size} explored prefixes`,
      );
      this.log.info(`Queued ${rebuilt} prefixes for exploration`);
    }

    const roots = this.frontier.pushAll(rootSeeds(this.charset, explored));
    if (roots > 0) {
      this.log.debug(`Seeded ${roots} root prefixes`);
    }
  }

  private async runWorker(): Promise<void> {
    const frontier = this.frontier;

    while (!this.shutdownRequested) {
      const item = await frontier.pop(this.config.pollIntervalMs);
      if (!item) {
        if (frontier.isDrained()) {
          return;
        }

        continue;
      }

      const prefix = item.prefix;
      if (this.state.isExplored(prefix) || this.inFlight.has(prefix)) {
        this.metrics.increment('prefixes.skipped');
        this.finish(item);
        continue;
      }

      this.inFlight.add(prefix);
      try {
        await this.explore(prefix);
      } catch (error) {
        this.log.error(`Error exploring prefix "${prefix}":`, error);
      } finally {
        this.inFlight.delete(prefix);
        this.finish(item);
      }

      try {
        this.checkpoints.maybeSave(this.state);
      } catch (error) {
        if (error instanceof CheckpointStorageError) {
          this.fatalError = error;
          this.requestShutdown();
          return;
        }

        throw error;
      }

      await this.rateController.wait(prefix);
    }
  }

  private async explore(prefix: string): Promise<void> {
    this.log.debug(`Processing prefix: "${prefix}"`);

    const outcome = await this.fetcher.fetch(prefix);

    if (!outcome.success) {
      this.recordLoss(prefix, outcome);
    } else {
      const expansion = expandPrefix(prefix, outcome.names, {
        maxResults: this.config.maxResults,
        charset: this.charset,
      });

      const added = this.state.addNames(expansion.names);
      this.metrics.increment('names.discovered', added);

      let queued = 0;
      for (const child of expansion.children) {
        if (
          !this.state.isExplored(child.prefix) &&
          this.frontier.push(child.prefix, child.priority)
        ) {
          queued += 1;
        }
      }

      this.log.debug(
        `Prefix "${prefix}": ${outcome.names.length} suggestions, ${added} new, ${queued} queued`,
      );
    }

    this.state.markExplored(prefix);
    this.metrics.increment('prefixes.explored');
  }

  private recordLoss(prefix: string, outcome: LookupFailure): void {
    if (outcome.errorClass !== 'retries-exhausted') {
      return;
    }

    this.metrics.increment('prefixes.abandoned');
    this.snapshots?.write({
      prefix,
      errorClass: outcome.errorClass,
      lastErrorClass: outcome.lastErrorClass,
      statusCode: outcome.statusCode,
      errorMessage: outcome.error,
      attempts: outcome.attempts,
      timestamp: Date.now(),
    });
  }

  private finish(item: QueueItem): void {
    this.frontier.complete(item);

    // Idle workers are parked in pop(); let them see the crawl is over
    if (this.frontier.isDrained()) {
      this.frontier.wakeAll();
    }
  }

  private logStatus(): void {
    const elapsedMs = performance.now() - this.startedAt;
    const delay = this.rateController.snapshot();

    this.metrics.gauge('frontier.size', this.frontier.size);
    this.metrics.gauge('delay.ms', delay.delayMs);

    this.log.info(
      [
        `Status: ${this.state.nameCount} names`,
        `${this.state.requestCount} requests`,
        `${this.frontier.size} queued`,
        `${this.metrics.perMinute('names.discovered', elapsedMs).toFixed(1)} names/min`,
        `${this.metrics.perMinute('requests.total', elapsedMs).toFixed(1)} requests/min`,
        `delay ${(delay.delayMs / 1000).toFixed(2)}s`,
        `${delay.totalSuccesses} successes`,
        `${delay.totalFailures} failures`,
      ].join(', '),
    );

    const rows = this.state.lengthStatsRows();
    if (rows.length > 0) {
      this.log.info(
        `Success rate by prefix length: ${rows
          .map(
            (row) =>
              `${row.length}: ${(row.successRate * 100).toFixed(1)}% (${row.success}/${row.queries})`,
          )
          .join(', ')}`,
      );
    }
  }
}
