import { describe, it, expect } from 'vitest';
import { RetryStrategy } from './retry-strategy.js';

describe('RetryStrategy', () => {
  const strategy = new RetryStrategy({ maxRetries: 3 }, () => 0);

  it('classifies 429 as rate-limited', () => {
    expect(strategy.classify({ statusCode: 429 })).toBe('rate-limited');
  });

  it('classifies 5xx as server-error', () => {
    expect(strategy.classify({ statusCode: 500 })).toBe('server-error');
    expect(strategy.classify({ statusCode: 503 })).toBe('server-error');
  });

  it('classifies transport failures as network-error', () => {
    expect(strategy.classify({ networkError: true })).toBe('network-error');
  });

  it('classifies other non-2xx statuses as client-error', () => {
    expect(strategy.classify({ statusCode: 404 })).toBe('client-error');
    expect(strategy.classify({ statusCode: 301 })).toBe('client-error');
  });

  it('classifies a 2xx with an unexpected body as malformed-response', () => {
    expect(strategy.classify({ statusCode: 200, malformedBody: true })).toBe(
      'malformed-response',
    );
  });

  it('returns undefined for a well-formed 2xx', () => {
    expect(strategy.classify({ statusCode: 200 })).toBeUndefined();
  });

  it('exponential backoff for rate-limited', () => {
    expect(strategy.decide('rate-limited', 0).delayMs).toBe(1000);
    expect(strategy.decide('rate-limited', 1).delayMs).toBe(2000);
    expect(strategy.decide('rate-limited', 2).delayMs).toBe(4000);
  });

  it('rate-limited backoff is capped at the ceiling', () => {
    expect(strategy.decide('rate-limited', 7).delayMs).toBe(90_000);
  });

  it('linear backoff for server-error', () => {
    expect(strategy.decide('server-error', 0).delayMs).toBe(5000);
    expect(strategy.decide('server-error', 1).delayMs).toBe(10_000);
    expect(strategy.decide('server-error', 20).delayMs).toBe(45_000);
  });

  it('exponential backoff for network-error', () => {
    expect(strategy.decide('network-error', 0).delayMs).toBe(2000);
    expect(strategy.decide('network-error', 3).delayMs).toBe(16_000);
    expect(strategy.decide('network-error', 5).delayMs).toBe(45_000);
  });

  it('retry decision respects maxRetries', () => {
    expect(strategy.decide('network-error', 2).shouldRetry).toBe(true);
    expect(strategy.decide('network-error', 3).shouldRetry).toBe(false);
    expect(strategy.decide('rate-limited', 3).shouldRetry).toBe(false);
  });

  it('never retries malformed or client errors', () => {
    expect(strategy.decide('malformed-response', 0)).toEqual({
      shouldRetry: false,
      delayMs: 0,
      errorClass: 'malformed-response',
    });
    expect(strategy.decide('client-error', 0).shouldRetry).toBe(false);
  });

  it('jitter stretches the delay by up to the configured ratio', () => {
    const jittered = new RetryStrategy({ jitterRatio: 0.3 }, () => 0.5);

    expect(jittered.decide('rate-limited', 0).delayMs).toBeCloseTo(1150, 6);
    expect(jittered.decide('server-error', 1).delayMs).toBeCloseTo(11_500, 6);
  });

  it('exposes the configured retry budget', () => {
    expect(strategy.maxRetries).toBe(3);
    expect(new RetryStrategy().maxRetries).toBe(8);
  });
});
