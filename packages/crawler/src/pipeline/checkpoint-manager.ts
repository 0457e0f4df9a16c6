import { createLogger, type Logger } from '@workspace/logger';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Charset } from '../charset/charset.js';
import type { FrontierSeed } from '../queue/types.js';
import type { CrawlState } from './crawl-state.js';
import { CheckpointStorageError } from './errors.js';
import type { CheckpointRecord } from './types.js';

const lengthStatsSchema = z.object({
  success: z.number().int().nonnegative().default(0),
  queries: z.number().int().nonnegative().default(0),
});

const checkpointRecordSchema = z.object({
  discovered_names: z.array(z.string()).default([]),
  explored_prefixes: z.array(z.string()).default([]),
  request_count: z.number().int().nonnegative().default(0),
  timestamp: z.number().default(0),
  prefix_length_stats: z
    .record(z.string().regex(/^\d+$/), lengthStatsSchema)
    .default({}),
});

type CheckpointManagerConfig = {
  path: string;
  everyRequests: number;
  intervalMs: number;
};

type CheckpointManagerOptions = {
  log?: Logger;
  now?: () => number;
};

const ROOT_PRIMARY_PRIORITY = 1;
const ROOT_SPECIAL_PRIORITY = 2;

export class CheckpointManager {
  readonly path: string;
  private readonly tmpPath: string;
  private readonly config: CheckpointManagerConfig;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastSavedRequestCount: number;
  private lastSavedAt: number;

  constructor(config: CheckpointManagerConfig, options?: CheckpointManagerOptions) {
    this.config = config;
    this.path = config.path;
    this.tmpPath = `${config.path}.tmp`;
    this.log = options?.log ?? createLogger('Checkpoint');
    this.now = options?.now ?? Date.now;
    this.lastSavedRequestCount = 0;
    this.lastSavedAt = this.now();
  }

  load(): CheckpointRecord | undefined {
    if (!existsSync(this.path)) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      this.log.warn(`Ignoring unreadable checkpoint ${this.path}:`, error);
      return undefined;
    }

    const result = checkpointRecordSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      this.log.warn(
        `Ignoring invalid checkpoint ${this.path}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(),
      );
      return undefined;
    }

    return result.data;
  }

  /** Restarts both triggers from the state a run resumes with. */
  begin(requestCount: number): void {
    this.lastSavedRequestCount = requestCount;
    this.lastSavedAt = this.now();
  }

  shouldSave(requestCount: number): boolean {
    return (
      requestCount - this.lastSavedRequestCount >= this.config.everyRequests ||
      this.now() - this.lastSavedAt >= this.config.intervalMs
    );
  }

  maybeSave(state: CrawlState): boolean {
    if (!this.shouldSave(state.requestCount)) {
      return false;
    }

    this.save(state);
    return true;
  }

  /**
   * Writes the state atomically. A failed write is retried once; a second
   * failure throws {@link CheckpointStorageError}.
   */
  save(state: CrawlState): void {
    const record = state.toRecord(this.now() / 1000);

    try {
      this.write(record);
    } catch (error) {
      this.log.error(`Checkpoint write to ${this.path} failed, retrying once:`, error);

      try {
        this.write(record);
      } catch (retryError) {
        const message = retryError instanceof Error ? retryError.message : String(retryError);
        throw new CheckpointStorageError(this.path, message, { cause: retryError });
      }
    }

    this.lastSavedRequestCount = record.request_count;
    this.lastSavedAt = this.now();
    this.log.info(
      `Checkpoint saved with ${record.discovered_names.length} names and ${record.explored_prefixes.length} explored prefixes`,
    );
  }

  remove(): boolean {
    const existed = existsSync(this.path);
    rmSync(this.path, { force: true });
    rmSync(this.tmpPath, { force: true, recursive: true });

    return existed;
  }

  private write(record: CheckpointRecord): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(this.tmpPath, JSON.stringify(record), 'utf-8');
    renameSync(this.tmpPath, this.path);
  }
}

function byLengthThenValue(left: string, right: string): number {
  if (left.length !== right.length) {
    return left.length - right.length;
  }

  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

/**
 * Every single-character extension of an explored prefix that is not itself
 * explored, shortest prefixes first, at priority `prefix.length + 1`.
 */
export function rebuildFrontier(
  explored: ReadonlySet<string>,
  charset: Charset,
): FrontierSeed[] {
  const ordered = [...explored].sort(byLengthThenValue);

  const seeds: FrontierSeed[] = [];
  for (const prefix of ordered) {
    for (const char of charset.characters) {
      const child = prefix + char;
      if (!explored.has(child)) {
        seeds.push({ prefix: child, priority: prefix.length + 1 });
      }
    }
  }

  return seeds;
}

export function rootSeeds(
  charset: Charset,
  explored: ReadonlySet<string> = new Set(),
): FrontierSeed[] {
  return charset.characters
    .filter((char) => !explored.has(char))
    .map((char) => ({
      prefix: char,
      priority:
        charset.tierOf(char) === 'special'
          ? ROOT_SPECIAL_PRIORITY
          : ROOT_PRIMARY_PRIORITY,
    }));
}

export { checkpointRecordSchema };
export type { CheckpointManagerConfig, CheckpointManagerOptions };
