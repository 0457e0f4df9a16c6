import { z } from 'zod';
import type { Charset } from '../charset/charset.js';
import {
  charsetFromConfig,
  crawlConfigShape,
  flagOption,
} from '../config/crawl-config.js';
import {
  CheckpointManager,
  rebuildFrontier,
  rootSeeds,
} from '../pipeline/checkpoint-manager.js';
import { CrawlState } from '../pipeline/crawl-state.js';
import type { CheckpointRecord, LengthStatsRow } from '../pipeline/types.js';
import { formatJson } from '../utils/json.js';

const statusArgsSchema = z.object({
  checkpointPath: crawlConfigShape.checkpointPath,
  charset: crawlConfigShape.charset,
  charsetOrder: crawlConfigShape.charsetOrder,
  pretty: flagOption(),
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type CheckpointStatus = {
  names: number;
  exploredPrefixes: number;
  requests: number;
  namesPerRequest: number;
  savedAt: string | null;
  ageSeconds: number | null;
  pendingPrefixes: number;
  lengthStats: LengthStatsRow[];
};

/** What a resumed crawl would start from, without touching the network. */
function summarizeCheckpoint(
  record: CheckpointRecord,
  charset: Charset,
  nowMs: number = Date.now(),
): CheckpointStatus {
  const state = CrawlState.fromRecord(record);
  const explored = state.exploredPrefixes;
  const pending = new Set(
    [...rebuildFrontier(explored, charset), ...rootSeeds(charset, explored)].map(
      (seed) => seed.prefix,
    ),
  );
  const saved = record.timestamp > 0;

  return {
    names: state.nameCount,
    exploredPrefixes: state.exploredCount,
    requests: state.requestCount,
    namesPerRequest:
      state.requestCount > 0
        ? Number((state.nameCount / state.requestCount).toFixed(2))
        : 0,
    savedAt: saved ? new Date(record.timestamp * 1000).toISOString() : null,
    ageSeconds: saved ? Math.max(0, Math.round(nowMs / 1000 - record.timestamp)) : null,
    pendingPrefixes: pending.size,
    lengthStats: state.lengthStatsRows(),
  };
}

function runStatusAction(args: StatusArgs): number {
  const record = new CheckpointManager({
    path: args.checkpointPath,
    everyRequests: Number.POSITIVE_INFINITY,
    intervalMs: Number.POSITIVE_INFINITY,
  }).load();

  if (!record) {
    console.error(`No usable checkpoint at ${args.checkpointPath}`);
    return 1;
  }

  console.log(formatJson(summarizeCheckpoint(record, charsetFromConfig(args)), args.pretty));
  return 0;
}

export { statusArgsSchema, summarizeCheckpoint, runStatusAction };
export type { StatusArgs, CheckpointStatus };
