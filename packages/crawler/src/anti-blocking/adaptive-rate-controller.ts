import { createLogger, type Logger } from '@workspace/logger';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import type { AdaptiveDelayConfig, AdaptiveDelaySnapshot } from './types.js';

const INCREASE_FACTOR = 1.5;
const DECREASE_FACTOR = 0.97;
const SUCCESS_RATIO_THRESHOLD = 0.85;
const MIN_SUCCESS_SAMPLE = 30;
const BASELINE_SUCCESSES = 15;
const BASELINE_FAILURES = 2;
const DEEP_PREFIX_LENGTH = 3;
const DEEP_PREFIX_FACTOR = 0.8;

type AdaptiveRateControllerOptions = {
  log?: Logger;
  sleep?: Sleep;
};

/**
 * One delay shared by every worker, widened on each failure and narrowed
 * slowly after a long run of successes.
 */
export class AdaptiveRateController {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly log: Logger;
  private readonly sleep: Sleep;
  private delayMs: number;
  private rollingSuccesses: number;
  private rollingFailures: number;
  private totalSuccesses: number;
  private totalFailures: number;

  constructor(
    config: AdaptiveDelayConfig,
    options?: AdaptiveRateControllerOptions,
  ) {
    if (config.minDelayMs > config.maxDelayMs) {
      throw new Error(
        `minDelayMs (${config.minDelayMs}) must not exceed maxDelayMs (${config.maxDelayMs})`,
      );
    }

    this.minDelayMs = config.minDelayMs;
    this.maxDelayMs = config.maxDelayMs;
    this.delayMs = this.clamp(config.initialDelayMs);
    this.log = options?.log ?? createLogger('RateController');
    this.sleep = options?.sleep ?? defaultSleep;
    this.rollingSuccesses = 0;
    this.rollingFailures = 0;
    this.totalSuccesses = 0;
    this.totalFailures = 0;
  }

  reportSuccess(): void {
    this.rollingSuccesses += 1;
    this.totalSuccesses += 1;

    const samples = this.rollingSuccesses + this.rollingFailures;
    const ratio = this.rollingSuccesses / Math.max(1, samples);

    if (
      ratio > SUCCESS_RATIO_THRESHOLD &&
      this.rollingSuccesses > MIN_SUCCESS_SAMPLE
    ) {
      this.delayMs = this.clamp(this.delayMs * DECREASE_FACTOR);
      this.rollingSuccesses = BASELINE_SUCCESSES;
      this.rollingFailures = BASELINE_FAILURES;
      this.log.debug(
        `Decreased delay to ${this.delayMs.toFixed(0)}ms after consistent success`,
      );
    }
  }

  reportFailure(): void {
    this.rollingFailures += 1;
    this.totalFailures += 1;
    this.rollingSuccesses = 0;
    this.delayMs = this.clamp(this.delayMs * INCREASE_FACTOR);
    this.log.info(`Increased delay to ${this.delayMs.toFixed(0)}ms after failure`);
  }

  currentDelay(): number {
    return this.delayMs;
  }

  delayFor(prefix: string): number {
    if (prefix.length > DEEP_PREFIX_LENGTH) {
      return Math.max(this.minDelayMs, this.delayMs * DEEP_PREFIX_FACTOR);
    }

    return this.delayMs;
  }

  async wait(prefix: string): Promise<void> {
    await this.sleep(this.delayFor(prefix));
  }

  snapshot(): AdaptiveDelaySnapshot {
    return {
      delayMs: this.delayMs,
      rollingSuccesses: this.rollingSuccesses,
      rollingFailures: this.rollingFailures,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
    };
  }

  private clamp(value: number): number {
    return Math.min(this.maxDelayMs, Math.max(this.minDelayMs, value));
  }
}

export type { AdaptiveRateControllerOptions };
