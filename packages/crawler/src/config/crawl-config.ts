import { z } from 'zod';
import { Charset } from '../charset/charset.js';
import type { CharsetPreset } from '../charset/types.js';

const DEFAULT_MAX_RESULTS: Readonly<Record<number, number>> = {
  1: 50,
  2: 75,
  3: 100,
};

const CHARSET_PRESETS: readonly CharsetPreset[] = ['alphanumeric', 'extended'];

function toNumber(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  if (!trimmed.length) {
    return undefined;
  }

  const parsedValue = Number(trimmed);
  return Number.isFinite(parsedValue) ? parsedValue : value;
}

function toText(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

function integerOption(flag: string, min: number) {
  const message = `Invalid --${flag}. Provide an integer >= ${min}.`;

  return z.preprocess(
    toNumber,
    z.number({ invalid_type_error: message }).int(message).min(min, message),
  );
}

function pathOption(flag: string) {
  return z.preprocess(toText, z.string().min(1, `Invalid --${flag} path`));
}

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function flagOption() {
  return z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema);
}

const crawlConfigShape = {
  baseUrl: z.preprocess(
    toText,
    z
      .string({ required_error: 'Missing required option: --baseUrl (or AUTOCOMPLETE_BASE_URL)' })
      .url('Invalid --baseUrl. Provide an http(s) URL.'),
  ),
  apiVersion: integerOption('apiVersion', 1).default(3),
  maxResults: integerOption('maxResults', 1).optional(),
  workers: integerOption('workers', 1).default(5),
  maxRetries: integerOption('maxRetries', 0).default(8),
  requestTimeoutMs: integerOption('requestTimeoutMs', 1).default(30_000),
  requestJitterMs: integerOption('requestJitterMs', 0).default(300),
  initialDelayMs: integerOption('initialDelayMs', 0).default(1000),
  minDelayMs: integerOption('minDelayMs', 0).default(800),
  maxDelayMs: integerOption('maxDelayMs', 0).default(3000),
  checkpointEveryRequests: integerOption('checkpointEveryRequests', 1).default(200),
  checkpointIntervalMs: integerOption('checkpointIntervalMs', 1).default(300_000),
  checkpointPath: pathOption('checkpointPath').default('tmp/checkpoint.json'),
  outputPath: pathOption('outputPath').default('tmp/discovered-names.json'),
  abandonedDir: pathOption('abandonedDir').default('tmp/abandoned'),
  maxSnapshots: integerOption('maxSnapshots', 0).default(100),
  charset: z
    .preprocess(toText, z.string().min(1, 'Invalid --charset'))
    .default('extended'),
  charsetOrder: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['codepoint', 'declared'], {
        message: 'Invalid --charsetOrder. Use codepoint or declared.',
      }),
    )
    .default('codepoint'),
  pollIntervalMs: integerOption('pollIntervalMs', 1).default(5000),
  statusIntervalMs: integerOption('statusIntervalMs', 1).default(30_000),
};

const crawlConfigSchema = z
  .object(crawlConfigShape)
  .superRefine((config, ctx) => {
    if (config.minDelayMs > config.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDelayMs'],
        message: `Invalid --maxDelayMs. It must be >= --minDelayMs (${config.minDelayMs}).`,
      });
    }

    if (
      config.maxResults === undefined &&
      DEFAULT_MAX_RESULTS[config.apiVersion] === undefined
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxResults'],
        message: `Missing --maxResults. API version ${config.apiVersion} has no known page size.`,
      });
    }
  })
  .transform((config) => ({
    ...config,
    maxResults: config.maxResults ?? DEFAULT_MAX_RESULTS[config.apiVersion] ?? 0,
  }));

const crawlFlagsSchema = z.object({
  fresh: flagOption(),
  pretty: flagOption(),
});

type CrawlConfig = z.output<typeof crawlConfigSchema>;
type CrawlFlags = z.output<typeof crawlFlagsSchema>;

/** Parses CLI-style options, taking the base URL from the environment when absent. */
function resolveCrawlConfig(
  options: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
) {
  return crawlConfigSchema.safeParse({
    baseUrl: env.AUTOCOMPLETE_BASE_URL,
    ...options,
  });
}

function isCharsetPreset(value: string): value is CharsetPreset {
  return CHARSET_PRESETS.some((preset) => preset === value);
}

function charsetFromConfig(config: Pick<CrawlConfig, 'charset' | 'charsetOrder'>): Charset {
  if (isCharsetPreset(config.charset)) {
    return Charset.fromPreset(config.charset, config.charsetOrder);
  }

  return new Charset(config.charset, '', config.charsetOrder);
}

export {
  flagOption,
  crawlConfigShape,
  crawlConfigSchema,
  crawlFlagsSchema,
  resolveCrawlConfig,
  charsetFromConfig,
};
export type { CrawlConfig, CrawlFlags };
