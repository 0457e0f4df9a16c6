import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { exportArgsSchema, runExportAction } from './export.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-export-action');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('runExportAction', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('writes sorted names from a checkpoint', () => {
    const checkpointPath = join(TEST_DIR, 'checkpoint.json');
    const outputPath = join(TEST_DIR, 'names.json');
    writeFileSync(
      checkpointPath,
      JSON.stringify({
        discovered_names: ['b', 'a'],
        explored_prefixes: ['a'],
        request_count: 2,
        timestamp: 1_700_000_000,
        prefix_length_stats: {},
      }),
      'utf-8',
    );

    const exitCode = runExportAction(
      exportArgsSchema.parse({ checkpointPath, outputPath }),
    );

    expect(exitCode).toBe(0);
    expect(JSON.parse(readFileSync(outputPath, 'utf-8'))).toEqual({
      total_requests: 2,
      total_names: 2,
      names: ['a', 'b'],
    });
  });

  it('fails without a checkpoint', () => {
    const exitCode = runExportAction(
      exportArgsSchema.parse({
        checkpointPath: join(TEST_DIR, 'missing.json'),
        outputPath: join(TEST_DIR, 'names.json'),
      }),
    );

    expect(exitCode).toBe(1);
    expect(existsSync(join(TEST_DIR, 'names.json'))).toBe(false);
  });
});
