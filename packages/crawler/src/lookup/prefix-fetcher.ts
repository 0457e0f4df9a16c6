import { createLogger, type Logger } from '@workspace/logger';
import { z } from 'zod';
import type { AdaptiveRateController } from '../anti-blocking/adaptive-rate-controller.js';
import type { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import type { ErrorClass } from '../anti-blocking/types.js';
import type { CrawlCounter, CrawlMetrics } from '../observability/metrics.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { AutocompleteNetworkError } from './errors.js';
import type {
  LookupClient,
  LookupOutcome,
  LookupRecorder,
} from './types.js';

const autocompleteBodySchema = z.object({
  results: z.array(z.string()),
  count: z.number().optional().catch(undefined),
});

type PrefixFetcherOptions = {
  client: LookupClient;
  maxResults: number;
  retryStrategy: RetryStrategy;
  rateController: AdaptiveRateController;
  recorder?: LookupRecorder;
  metrics?: CrawlMetrics;
  requestJitterMs?: number;
  random?: () => number;
  sleep?: Sleep;
  log?: Logger;
};

type AttemptResult =
  | { ok: true; names: string[]; count?: number }
  | { ok: false; errorClass: ErrorClass; error: string; statusCode?: number };

const FAILURE_COUNTERS: Record<ErrorClass, CrawlCounter | undefined> = {
  'rate-limited': 'requests.rateLimited',
  'server-error': 'requests.serverError',
  'network-error': 'requests.networkError',
  'malformed-response': 'requests.malformed',
  'client-error': 'requests.clientError',
  'retries-exhausted': undefined,
};

/**
 * Runs one prefix lookup to completion: issues the request, classifies the
 * answer and retries transient failures with backoff. Never throws for a
 * failed lookup; the outcome says what happened.
 */
export class PrefixFetcher {
  private readonly client: LookupClient;
  private readonly maxResults: number;
  private readonly retryStrategy: RetryStrategy;
  private readonly rateController: AdaptiveRateController;
  private readonly recorder: LookupRecorder | undefined;
  private readonly metrics: CrawlMetrics | undefined;
  private readonly requestJitterMs: number;
  private readonly random: () => number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: PrefixFetcherOptions) {
    this.client = options.client;
    this.maxResults = options.maxResults;
    this.retryStrategy = options.retryStrategy;
    this.rateController = options.rateController;
    this.recorder = options.recorder;
    this.metrics = options.metrics;
    this.requestJitterMs = options.requestJitterMs ?? 300;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? createLogger('Fetcher');
  }

  async fetch(prefix: string): Promise<LookupOutcome> {
    for (let retryCount = 0; ; retryCount += 1) {
      if (this.requestJitterMs > 0) {
        await this.sleep(this.random() * this.requestJitterMs);
      }

      const result = await this.attempt(prefix);
      const attempts = retryCount + 1;

      if (result.ok) {
        this.rateController.reportSuccess();
        this.recorder?.recordQuery(prefix.length, result.names.length);
        this.metrics?.increment('requests.success');
        this.log.debug(
          `Query "${prefix}" returned ${result.names.length} suggestions (count: ${result.count ?? 'n/a'})`,
        );

        return {
          success: true,
          names: result.names,
          truncated: result.names.length >= this.maxResults,
          count: result.count,
          attempts,
        };
      }

      const counter = FAILURE_COUNTERS[result.errorClass];
      if (counter) {
        this.metrics?.increment(counter);
      }

      if (result.errorClass === 'malformed-response') {
        this.log.warn(`Unexpected response shape for "${prefix}", treating as empty`);
        return this.failure(result, result.errorClass, attempts);
      }

      if (result.errorClass === 'client-error') {
        this.log.error(`Query "${prefix}" failed: ${result.error}`);
        return this.failure(result, result.errorClass, attempts);
      }

      this.rateController.reportFailure();

      const decision = this.retryStrategy.decide(result.errorClass, retryCount);
      if (!decision.shouldRetry) {
        this.log.error(
          `Max retries reached for "${prefix}" after ${attempts} attempts (${result.errorClass}), skipping`,
        );
        return this.failure(result, 'retries-exhausted', attempts);
      }

      this.log.warn(
        `${result.error}. Sleeping ${(decision.delayMs / 1000).toFixed(2)}s (retry ${retryCount + 1}/${this.retryStrategy.maxRetries})`,
      );
      await this.sleep(decision.delayMs);
    }
  }

  private async attempt(prefix: string): Promise<AttemptResult> {
    this.recorder?.recordRequest();
    this.metrics?.increment('requests.total');
    const startTime = performance.now();

    try {
      const response = await this.client.lookup(prefix);
      const statusCode = response.statusCode;

      const statusClass = this.retryStrategy.classify({ statusCode });
      if (statusClass) {
        return {
          ok: false,
          errorClass: statusClass,
          error: `Query "${prefix}" answered HTTP ${statusCode}`,
          statusCode,
        };
      }

      const parsed = autocompleteBodySchema.safeParse(response.body);
      if (!parsed.success) {
        return {
          ok: false,
          errorClass: 'malformed-response',
          error: parsed.error.issues[0]?.message ?? 'Unexpected response body',
          statusCode,
        };
      }

      return { ok: true, names: parsed.data.results, count: parsed.data.count };
    } catch (error) {
      if (error instanceof AutocompleteNetworkError) {
        return { ok: false, errorClass: 'network-error', error: error.message };
      }

      throw error;
    } finally {
      this.metrics?.recordDuration(performance.now() - startTime);
    }
  }

  private failure(
    result: Extract<AttemptResult, { ok: false }>,
    errorClass: ErrorClass,
    attempts: number,
  ): LookupOutcome {
    return {
      success: false,
      errorClass,
      lastErrorClass: result.errorClass,
      error: result.error,
      statusCode: result.statusCode,
      attempts,
    };
  }
}

export type { PrefixFetcherOptions };
