import { createLogger, type Logger } from '@workspace/logger';
import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ErrorClass } from '../anti-blocking/types.js';

type AbandonedPrefixSnapshot = {
  prefix: string;
  errorClass: ErrorClass;
  lastErrorClass: ErrorClass;
  statusCode?: number;
  errorMessage: string;
  attempts: number;
  timestamp: number;
};

type ErrorSnapshotConfig = {
  directory: string;
  maxSnapshots: number;
};

const DEFAULT_CONFIG: ErrorSnapshotConfig = {
  directory: 'tmp/abandoned',
  maxSnapshots: 100,
};

/**
 * One JSON file per prefix the crawl gave up on, so a later run (or a human)
 * can requeue them. Writes stop once `maxSnapshots` files exist.
 */
export class ErrorSnapshotWriter {
  private readonly config: ErrorSnapshotConfig;
  private readonly log: Logger;
  private snapshotCount: number;

  constructor(config?: Partial<ErrorSnapshotConfig>, log?: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = log ?? createLogger('ErrorSnapshot');
    this.snapshotCount = 0;
  }

  initialize(): void {
    if (!existsSync(this.config.directory)) {
      mkdirSync(this.config.directory, { recursive: true });
    }

    this.snapshotCount = this.countExistingSnapshots();
  }

  write(data: AbandonedPrefixSnapshot): boolean {
    if (this.snapshotCount >= this.config.maxSnapshots) {
      return false;
    }

    try {
      if (!existsSync(this.config.directory)) {
        mkdirSync(this.config.directory, { recursive: true });
      }

      const baseName = `${this.sanitizeFilename(data.prefix)}-${data.timestamp}`;
      const jsonPath = join(this.config.directory, `${baseName}.json`);
      writeFileSync(jsonPath, JSON.stringify(data, null, 2), 'utf-8');

      this.snapshotCount += 1;
      return true;
    } catch (error) {
      this.log.warn(`Could not snapshot abandoned prefix "${data.prefix}":`, error);
      return false;
    }
  }

  getSnapshotCount(): number {
    return this.snapshotCount;
  }

  private countExistingSnapshots(): number {
    return readdirSync(this.config.directory).filter((file) =>
      file.endsWith('.json'),
    ).length;
  }

  // Prefixes may hold punctuation; hex-encode anything unsafe in a file name
  private sanitizeFilename(value: string): string {
    const safe = Array.from(value, (char) =>
      /[a-z0-9]/i.test(char) ? char : `_${char.charCodeAt(0).toString(16)}`,
    ).join('');

    return safe.slice(0, 100) || '_';
  }
}

export type { AbandonedPrefixSnapshot, ErrorSnapshotConfig };
