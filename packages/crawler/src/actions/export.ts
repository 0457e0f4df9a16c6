import { log } from '@workspace/logger';
import { z } from 'zod';
import { crawlConfigShape, flagOption } from '../config/crawl-config.js';
import { CheckpointManager } from '../pipeline/checkpoint-manager.js';
import { CrawlState } from '../pipeline/crawl-state.js';
import { ResultWriter } from '../pipeline/result-writer.js';

const exportArgsSchema = z.object({
  checkpointPath: crawlConfigShape.checkpointPath,
  outputPath: crawlConfigShape.outputPath,
  pretty: flagOption(),
});

type ExportArgs = z.infer<typeof exportArgsSchema>;

function runExportAction(args: ExportArgs): number {
  const record = new CheckpointManager({
    path: args.checkpointPath,
    everyRequests: Number.POSITIVE_INFINITY,
    intervalMs: Number.POSITIVE_INFINITY,
  }).load();

  if (!record) {
    console.error(`No usable checkpoint at ${args.checkpointPath}`);
    return 1;
  }

  const output = CrawlState.fromRecord(record).toOutput();
  new ResultWriter(args.outputPath, args.pretty).write(output);
  log.info(`Exported ${output.total_names} names to ${args.outputPath}`);

  return 0;
}

export { exportArgsSchema, runExportAction };
export type { ExportArgs };
