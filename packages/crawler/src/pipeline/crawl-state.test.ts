import { describe, it, expect } from 'vitest';
import { CrawlState } from './crawl-state.js';

describe('CrawlState', () => {
  it('counts only names it had not seen', () => {
    const state = new CrawlState();

    expect(state.addNames(['beta', 'alpha'])).toBe(2);
    expect(state.addNames(['alpha', 'gamma', 'gamma'])).toBe(1);
    expect(state.nameCount).toBe(3);
    expect(state.sortedNames()).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('marks a prefix explored once', () => {
    const state = new CrawlState();

    expect(state.markExplored('ab')).toBe(true);
    expect(state.markExplored('ab')).toBe(false);
    expect(state.isExplored('ab')).toBe(true);
    expect(state.isExplored('a')).toBe(false);
    expect(state.exploredCount).toBe(1);
  });

  it('tracks per-length success rates', () => {
    const state = new CrawlState();
    state.recordQuery(1, 5);
    state.recordQuery(1, 0);
    state.recordQuery(3, 2);

    expect(state.lengthStatsRows()).toEqual([
      { length: 1, success: 1, queries: 2, successRate: 0.5 },
      { length: 3, success: 1, queries: 1, successRate: 1 },
    ]);
  });

  it('round-trips through a checkpoint record', () => {
    const state = new CrawlState();
    state.addNames(['ab', 'aa']);
    state.markExplored('a');
    state.recordRequest();
    state.recordRequest();
    state.recordQuery(1, 2);

    const record = state.toRecord(1_700_000_000.5);

    expect(record).toEqual({
      discovered_names: ['ab', 'aa'],
      explored_prefixes: ['a'],
      request_count: 2,
      timestamp: 1_700_000_000.5,
      prefix_length_stats: { '1': { success: 1, queries: 1 } },
    });

    const restored = CrawlState.fromRecord(record);
    expect(restored.sortedNames()).toEqual(['aa', 'ab']);
    expect(restored.isExplored('a')).toBe(true);
    expect(restored.requestCount).toBe(2);
    expect(restored.toRecord(1_700_000_000.5)).toEqual(record);
  });

  it('builds the final output with sorted names', () => {
    const state = new CrawlState();
    state.addNames(['c', 'a', 'b']);
    state.recordRequest();

    expect(state.toOutput()).toEqual({
      total_requests: 1,
      total_names: 3,
      names: ['a', 'b', 'c'],
    });
  });
});
