import type { LookupRecorder } from '../lookup/types.js';
import type {
  CheckpointRecord,
  CrawlOutput,
  LengthStats,
  LengthStatsRow,
} from './types.js';

/**
 * Everything a run accumulates: discovered names, explored prefixes, the
 * request count and per-length query stats. Both sets only ever grow.
 */
export class CrawlState implements LookupRecorder {
  private readonly names: Set<string>;
  private readonly explored: Set<string>;
  private readonly lengthStats: Map<number, LengthStats>;
  private requests: number;

  constructor() {
    this.names = new Set();
    this.explored = new Set();
    this.lengthStats = new Map();
    this.requests = 0;
  }

  static fromRecord(record: CheckpointRecord): CrawlState {
    const state = new CrawlState();
    state.addNames(record.discovered_names);

    for (const prefix of record.explored_prefixes) {
      state.explored.add(prefix);
    }

    state.requests = record.request_count;

    for (const [length, stats] of Object.entries(record.prefix_length_stats)) {
      state.lengthStats.set(Number(length), { ...stats });
    }

    return state;
  }

  /** Returns how many of `names` were new. */
  addNames(names: Iterable<string>): number {
    let added = 0;

    for (const name of names) {
      if (!this.names.has(name)) {
        this.names.add(name);
        added += 1;
      }
    }

    return added;
  }

  markExplored(prefix: string): boolean {
    if (this.explored.has(prefix)) {
      return false;
    }

    this.explored.add(prefix);
    return true;
  }

  isExplored(prefix: string): boolean {
    return this.explored.has(prefix);
  }

  recordRequest(): void {
    this.requests += 1;
  }

  recordQuery(prefixLength: number, resultCount: number): void {
    const stats = this.lengthStats.get(prefixLength) ?? { success: 0, queries: 0 };
    stats.queries += 1;
    if (resultCount > 0) {
      stats.success += 1;
    }

    this.lengthStats.set(prefixLength, stats);
  }

  get requestCount(): number {
    return this.requests;
  }

  get nameCount(): number {
    return this.names.size;
  }

  get exploredCount(): number {
    return this.explored.size;
  }

  get exploredPrefixes(): ReadonlySet<string> {
    return this.explored;
  }

  sortedNames(): string[] {
    return [...this.names].sort();
  }

  lengthStatsRows(): LengthStatsRow[] {
    return [...this.lengthStats.entries()]
      .sort(([left], [right]) => left - right)
      .map(([length, stats]) => ({
        length,
        success: stats.success,
        queries: stats.queries,
        successRate: stats.queries > 0 ? stats.success / stats.queries : 0,
      }));
  }

  toRecord(timestamp: number = Date.now() / 1000): CheckpointRecord {
    const prefixLengthStats: Record<string, LengthStats> = {};
    for (const [length, stats] of this.lengthStats) {
      prefixLengthStats[String(length)] = { ...stats };
    }

    return {
      discovered_names: [...this.names],
      explored_prefixes: [...this.explored],
      request_count: this.requests,
      timestamp,
      prefix_length_stats: prefixLengthStats,
    };
  }

  toOutput(): CrawlOutput {
    const names = this.sortedNames();

    return {
      total_requests: this.requests,
      total_names: names.length,
      names,
    };
  }
}
