import type { ErrorClass, RetryDecision } from './types.js';

type ClassifyInput = {
  statusCode?: number;
  networkError?: boolean;
  malformedBody?: boolean;
};

type RetryStrategyConfig = {
  maxRetries: number;
  rateLimitBaseMs: number;
  rateLimitCeilingMs: number;
  serverErrorStepMs: number;
  serverErrorCeilingMs: number;
  networkBaseMs: number;
  networkCeilingMs: number;
  jitterRatio: number;
};

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxRetries: 8,
  rateLimitBaseMs: 1000,
  rateLimitCeilingMs: 90_000,
  serverErrorStepMs: 5000,
  serverErrorCeilingMs: 45_000,
  networkBaseMs: 2000,
  networkCeilingMs: 45_000,
  jitterRatio: 0.3,
};

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;
  private readonly random: () => number;

  constructor(
    config?: Partial<RetryStrategyConfig>,
    random: () => number = Math.random,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.random = random;
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  classify(input: ClassifyInput): ErrorClass | undefined {
    if (input.networkError) {
      return 'network-error';
    }

    const status = input.statusCode;
    if (status === undefined) {
      return input.malformedBody ? 'malformed-response' : undefined;
    }

    if (status === 429) {
      return 'rate-limited';
    }

    if (status >= 500) {
      return 'server-error';
    }

    if (status < 200 || status >= 300) {
      return 'client-error';
    }

    return input.malformedBody ? 'malformed-response' : undefined;
  }

  decide(errorClass: ErrorClass, retryCount: number): RetryDecision {
    const maxRetries = this.config.maxRetries;

    switch (errorClass) {
      case 'rate-limited':
        return {
          shouldRetry: retryCount < maxRetries,
          delayMs: this.backoff(
            this.config.rateLimitBaseMs * Math.pow(2, retryCount),
            this.config.rateLimitCeilingMs,
          ),
          errorClass,
        };

      case 'server-error':
        return {
          shouldRetry: retryCount < maxRetries,
          delayMs: this.backoff(
            this.config.serverErrorStepMs * (retryCount + 1),
            this.config.serverErrorCeilingMs,
          ),
          errorClass,
        };

      case 'network-error':
        return {
          shouldRetry: retryCount < maxRetries,
          delayMs: this.backoff(
            this.config.networkBaseMs * Math.pow(2, retryCount),
            this.config.networkCeilingMs,
          ),
          errorClass,
        };

      case 'malformed-response':
      case 'client-error':
      case 'retries-exhausted':
        return {
          shouldRetry: false,
          delayMs: 0,
          errorClass,
        };
    }
  }

  private backoff(delayMs: number, ceilingMs: number): number {
    const jitter = 1 + this.random() * this.config.jitterRatio;
    return Math.min(ceilingMs, delayMs * jitter);
  }
}

export type { ClassifyInput, RetryStrategyConfig };
