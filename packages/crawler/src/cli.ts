#!/usr/bin/env node
import { z } from 'zod';
import { runCrawlAction } from './actions/crawl.js';
import { exportArgsSchema, runExportAction } from './actions/export.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';
import { parseArgs } from './cli-args.js';
import { crawlFlagsSchema, resolveCrawlConfig } from './config/crawl-config.js';

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('crawl'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('status'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('export'),
    options: z.record(z.string(), z.string()),
  }),
]);

function printHelp(): void {
  console.log(`prefix-crawler CLI

Usage:
  cli help
  cli crawl --baseUrl=http://localhost:8000
  cli crawl --baseUrl=http://localhost:8000 --apiVersion=2 --workers=8
  cli crawl --baseUrl=http://localhost:8000 --charset=alphanumeric --charsetOrder=declared
  cli crawl --baseUrl=http://localhost:8000 --fresh --pretty
  cli status --checkpointPath=./tmp/checkpoint.json --pretty
  cli export --checkpointPath=./tmp/checkpoint.json --outputPath=./tmp/names.json

Commands:
  help    Show this help message
  crawl   Enumerate every name the autocomplete endpoint knows, resuming from the checkpoint
  status  Summarize a checkpoint as JSON
  export  Write the final name list from a checkpoint without crawling

Crawl options:
  --baseUrl     Required unless AUTOCOMPLETE_BASE_URL is set. Service root URL.
  --apiVersion  Endpoint version, /v{N}/autocomplete (default: 3).
  --maxResults  Page size (default: 50 for v1, 75 for v2, 100 for v3).
  --workers     Concurrent workers (default: 5).
  --maxRetries  Retries after the first attempt for 429, 5xx and network errors (default: 8).
  --requestTimeoutMs  Per-request timeout (default: 30000).
  --requestJitterMs   Upper bound of the random pause before each request (default: 300).
  --initialDelayMs    Starting inter-request delay (default: 1000).
  --minDelayMs  Lower bound of the adaptive delay (default: 800).
  --maxDelayMs  Upper bound of the adaptive delay (default: 3000).
  --checkpointEveryRequests  Save after this many requests (default: 200).
  --checkpointIntervalMs     Save after this much time (default: 300000).
  --checkpointPath  Checkpoint file (default: tmp/checkpoint.json).
  --outputPath      Final output file (default: tmp/discovered-names.json).
  --abandonedDir    Snapshots of prefixes given up on (default: tmp/abandoned).
  --maxSnapshots    Cap on abandoned-prefix snapshots (default: 100).
  --charset     alphanumeric, extended, or a custom string of characters (default: extended).
  --charsetOrder  codepoint or declared (default: codepoint).
  --pollIntervalMs    How long an idle worker waits for work (default: 5000).
  --statusIntervalMs  Status log interval (default: 30000).
  --fresh       Delete the checkpoint first.
  --pretty      Pretty-print JSON output.

Status options:
  --checkpointPath, --charset, --charsetOrder, --pretty (as for crawl)

Export options:
  --checkpointPath, --outputPath, --pretty (as for crawl)

Environment:
  LOG_LEVEL   fatal, error, warn, info, debug, trace or silent (default: info)
  LOG_FILE    Also write JSON log lines to this file
`);
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid arguments';
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'crawl') {
    const parsedConfig = resolveCrawlConfig(parsedCliInput.data.options);
    if (!parsedConfig.success) {
      console.error(firstIssue(parsedConfig.error));
      printHelp();
      return 1;
    }

    const parsedFlags = crawlFlagsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedFlags.success) {
      console.error(firstIssue(parsedFlags.error));
      printHelp();
      return 1;
    }

    return runCrawlAction(parsedConfig.data, parsedFlags.data);
  }

  if (parsedCliInput.data.command === 'status') {
    const parsedStatusArgs = statusArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedStatusArgs.success) {
      console.error(firstIssue(parsedStatusArgs.error));
      printHelp();
      return 1;
    }

    return runStatusAction(parsedStatusArgs.data);
  }

  if (parsedCliInput.data.command === 'export') {
    const parsedExportArgs = exportArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedExportArgs.success) {
      console.error(firstIssue(parsedExportArgs.error));
      printHelp();
      return 1;
    }

    return runExportAction(parsedExportArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
