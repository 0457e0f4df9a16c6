import { describe, it, expect } from 'vitest';
import {
  charsetFromConfig,
  crawlFlagsSchema,
  resolveCrawlConfig,
} from './crawl-config.js';

describe('resolveCrawlConfig', () => {
  it('applies defaults', () => {
    const result = resolveCrawlConfig({ baseUrl: 'http://autocomplete.test' }, {});

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      baseUrl: 'http://autocomplete.test',
      apiVersion: 3,
      maxResults: 100,
      workers: 5,
      maxRetries: 8,
      requestTimeoutMs: 30_000,
      requestJitterMs: 300,
      initialDelayMs: 1000,
      minDelayMs: 800,
      maxDelayMs: 3000,
      checkpointEveryRequests: 200,
      checkpointIntervalMs: 300_000,
      checkpointPath: 'tmp/checkpoint.json',
      outputPath: 'tmp/discovered-names.json',
      abandonedDir: 'tmp/abandoned',
      maxSnapshots: 100,
      charset: 'extended',
      charsetOrder: 'codepoint',
      pollIntervalMs: 5000,
      statusIntervalMs: 30_000,
    });
  });

  it('parses string options the way the CLI passes them', () => {
    const result = resolveCrawlConfig(
      {
        baseUrl: 'http://autocomplete.test',
        apiVersion: '1',
        workers: ' 3 ',
        charsetOrder: 'DECLARED',
        outputPath: './out/names.json',
      },
      {},
    );

    expect(result.data?.apiVersion).toBe(1);
    expect(result.data?.maxResults).toBe(50);
    expect(result.data?.workers).toBe(3);
    expect(result.data?.charsetOrder).toBe('declared');
    expect(result.data?.outputPath).toBe('./out/names.json');
  });

  it('lets an explicit page size win over the version default', () => {
    const result = resolveCrawlConfig(
      { baseUrl: 'http://autocomplete.test', apiVersion: '2', maxResults: '10' },
      {},
    );

    expect(result.data?.maxResults).toBe(10);
  });

  it('takes the base URL from the environment', () => {
    const result = resolveCrawlConfig({}, { AUTOCOMPLETE_BASE_URL: 'http://from-env.test' });

    expect(result.data?.baseUrl).toBe('http://from-env.test');
  });

  it('requires a base URL', () => {
    const result = resolveCrawlConfig({}, {});

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'Missing required option: --baseUrl (or AUTOCOMPLETE_BASE_URL)',
    );
  });

  it('rejects a non-numeric worker count', () => {
    const result = resolveCrawlConfig(
      { baseUrl: 'http://autocomplete.test', workers: 'many' },
      {},
    );

    expect(result.error?.issues[0]?.message).toBe(
      'Invalid --workers. Provide an integer >= 1.',
    );
  });

  it('rejects inverted delay bounds', () => {
    const result = resolveCrawlConfig(
      { baseUrl: 'http://autocomplete.test', minDelayMs: '500', maxDelayMs: '100' },
      {},
    );

    expect(result.error?.issues[0]?.message).toBe(
      'Invalid --maxDelayMs. It must be >= --minDelayMs (500).',
    );
  });

  it('asks for a page size on an unknown API version', () => {
    const result = resolveCrawlConfig(
      { baseUrl: 'http://autocomplete.test', apiVersion: '7' },
      {},
    );

    expect(result.error?.issues[0]?.path).toEqual(['maxResults']);
  });
});

describe('crawlFlagsSchema', () => {
  it('defaults missing flags to false', () => {
    expect(crawlFlagsSchema.parse({})).toEqual({ fresh: false, pretty: false });
    expect(crawlFlagsSchema.parse({ baseUrl: 'http://localhost:8000' })).toEqual({
      fresh: false,
      pretty: false,
    });
  });

  it('reads bare flags as true', () => {
    expect(crawlFlagsSchema.parse({ fresh: 'true' })).toEqual({ fresh: true, pretty: false });
    expect(crawlFlagsSchema.parse({ pretty: 'TRUE', fresh: 'false' })).toEqual({
      fresh: false,
      pretty: true,
    });
  });
});

describe('charsetFromConfig', () => {
  it('resolves presets', () => {
    expect(charsetFromConfig({ charset: 'alphanumeric', charsetOrder: 'codepoint' }).size).toBe(36);
    expect(charsetFromConfig({ charset: 'extended', charsetOrder: 'codepoint' }).size).toBe(65);
  });

  it('treats anything else as custom primary characters', () => {
    const charset = charsetFromConfig({ charset: 'xyx', charsetOrder: 'declared' });

    expect(charset.characters).toEqual(['x', 'y']);
    expect(charset.order).toBe('declared');
  });
});
