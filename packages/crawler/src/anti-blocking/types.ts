type ErrorClass =
  | 'rate-limited'
  | 'server-error'
  | 'network-error'
  | 'malformed-response'
  | 'client-error'
  | 'retries-exhausted';

type RetryDecision = {
  shouldRetry: boolean;
  delayMs: number;
  errorClass: ErrorClass;
};

type AdaptiveDelayConfig = {
  initialDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
};

type AdaptiveDelaySnapshot = {
  delayMs: number;
  rollingSuccesses: number;
  rollingFailures: number;
  totalSuccesses: number;
  totalFailures: number;
};

export type {
  ErrorClass,
  RetryDecision,
  AdaptiveDelayConfig,
  AdaptiveDelaySnapshot,
};
