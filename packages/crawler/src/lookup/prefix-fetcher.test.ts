import { describe, it, expect } from 'vitest';
import { AdaptiveRateController } from '../anti-blocking/adaptive-rate-controller.js';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import { CrawlMetrics } from '../observability/metrics.js';
import { FakeAutocompleteService } from '../test-utils/fake-autocomplete-service.js';
import { AutocompleteClient } from './autocomplete-client.js';
import { PrefixFetcher } from './prefix-fetcher.js';

const NAMES = ['aa', 'ab', 'ac', 'b'];

function makeFetcher(
  service: FakeAutocompleteService,
  overrides?: { requestJitterMs?: number; random?: () => number },
) {
  const sleeps: number[] = [];
  const delaysAtSleep: number[] = [];
  const requests: number[] = [];
  const queries: Array<[number, number]> = [];
  const metrics = new CrawlMetrics();

  const rateController = new AdaptiveRateController(
    { initialDelayMs: 1000, minDelayMs: 100, maxDelayMs: 10_000 },
    { sleep: async () => {} },
  );

  const client = new AutocompleteClient({
    baseUrl: 'http://autocomplete.test/',
    apiVersion: 3,
    maxResults: 2,
    timeoutMs: 1000,
    adapter: service.adapter,
  });

  const fetcher = new PrefixFetcher({
    client,
    maxResults: 2,
    retryStrategy: new RetryStrategy({ maxRetries: 3 }, () => 0),
    rateController,
    metrics,
    recorder: {
      recordRequest: () => requests.push(1),
      recordQuery: (prefixLength, resultCount) => queries.push([prefixLength, resultCount]),
    },
    requestJitterMs: overrides?.requestJitterMs ?? 0,
    random: overrides?.random,
    sleep: async (ms) => {
      sleeps.push(ms);
      delaysAtSleep.push(rateController.currentDelay());
    },
  });

  return { fetcher, client, rateController, metrics, sleeps, delaysAtSleep, requests, queries };
}

describe('PrefixFetcher', () => {
  it('returns the names of a well-formed page', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    const { fetcher, rateController, queries } = makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(outcome).toEqual({
      success: true,
      names: ['aa', 'ab'],
      truncated: true,
      count: 3,
      attempts: 1,
    });
    expect(rateController.snapshot().totalSuccesses).toBe(1);
    expect(queries).toEqual([[1, 2]]);
  });

  it('reports a short page as not truncated', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    const { fetcher } = makeFetcher(service);

    const outcome = await fetcher.fetch('b');

    expect(outcome.success && outcome.truncated).toBe(false);
    expect(outcome.success && outcome.names).toEqual(['b']);
  });

  it('retries through three rate limits and returns the final payload', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ status: 429 }, { status: 429 }, { status: 429 });
    const { fetcher, rateController, metrics, sleeps, delaysAtSleep, requests } =
      makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(outcome).toEqual({
      success: true,
      names: ['aa', 'ab'],
      truncated: true,
      count: 3,
      attempts: 4,
    });
    const snap = rateController.snapshot();
    expect(snap.totalFailures).toBe(3);
    expect(snap.rollingFailures).toBe(3);
    expect(delaysAtSleep).toEqual([1500, 2250, 3375]);
    expect(sleeps).toEqual([1000, 2000, 4000]);
    expect(requests).toHaveLength(4);
    expect(metrics.count('requests.total')).toBe(4);
    expect(metrics.count('requests.rateLimited')).toBe(3);
    expect(metrics.count('requests.success')).toBe(1);
  });

  it('gives up on server errors once retries are exhausted', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script(
      { status: 503 },
      { status: 503 },
      { status: 502 },
      { status: 500 },
    );
    const { fetcher, rateController, sleeps } = makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(outcome).toEqual({
      success: false,
      errorClass: 'retries-exhausted',
      lastErrorClass: 'server-error',
      error: 'Query "a" answered HTTP 500',
      statusCode: 500,
      attempts: 4,
    });
    expect(sleeps).toEqual([5000, 10_000, 15_000]);
    expect(rateController.snapshot().totalFailures).toBe(4);
    expect(service.queries).toEqual(['a', 'a', 'a', 'a']);
  });

  it('retries a network failure with exponential backoff', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ networkError: 'socket hang up' });
    const { fetcher, sleeps, metrics } = makeFetcher(service);

    const outcome = await fetcher.fetch('b');

    expect(outcome.success).toBe(true);
    expect(outcome.attempts).toBe(2);
    expect(sleeps).toEqual([2000]);
    expect(metrics.count('requests.networkError')).toBe(1);
  });

  it('treats a malformed body as empty without retrying', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ status: 200, body: { items: ['aa'] } });
    const { fetcher, rateController, sleeps, queries } = makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(outcome.success).toBe(false);
    expect(!outcome.success && outcome.errorClass).toBe('malformed-response');
    expect(outcome.attempts).toBe(1);
    expect(sleeps).toEqual([]);
    expect(queries).toEqual([]);
    expect(rateController.snapshot().totalFailures).toBe(0);
  });

  it('rejects results that are not all strings', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ status: 200, body: { results: ['aa', 7] } });
    const { fetcher } = makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(!outcome.success && outcome.errorClass).toBe('malformed-response');
  });

  it('does not retry other client errors', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ status: 404, body: { detail: 'Not Found' } });
    const { fetcher, rateController } = makeFetcher(service);

    const outcome = await fetcher.fetch('a');

    expect(!outcome.success && outcome.errorClass).toBe('client-error');
    expect(!outcome.success && outcome.statusCode).toBe(404);
    expect(service.queries).toEqual(['a']);
    expect(rateController.snapshot().totalFailures).toBe(0);
  });

  it('ignores a count field of the wrong type', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    service.script({ status: 200, body: { results: ['b'], count: 'many' } });
    const { fetcher } = makeFetcher(service);

    const outcome = await fetcher.fetch('b');

    expect(outcome).toEqual({
      success: true,
      names: ['b'],
      truncated: false,
      count: undefined,
      attempts: 1,
    });
  });

  it('sleeps a random jitter before each request', async () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    const { fetcher, sleeps } = makeFetcher(service, {
      requestJitterMs: 300,
      random: () => 0.5,
    });

    await fetcher.fetch('b');

    expect(sleeps).toEqual([150]);
  });

  it('targets the versioned endpoint', () => {
    const service = new FakeAutocompleteService({ names: NAMES });
    const { client } = makeFetcher(service);

    expect(client.endpoint).toBe('http://autocomplete.test/v3/autocomplete');
  });
});
