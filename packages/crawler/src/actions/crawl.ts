import { log } from '@workspace/logger';
import type { CrawlConfig, CrawlFlags } from '../config/crawl-config.js';
import { createNamespaceCrawler } from '../orchestrator/create-crawler.js';
import { CheckpointManager } from '../pipeline/checkpoint-manager.js';
import { CheckpointStorageError } from '../pipeline/errors.js';
import { ResultWriter } from '../pipeline/result-writer.js';
import { formatJson } from '../utils/json.js';

export async function runCrawlAction(
  config: CrawlConfig,
  flags: CrawlFlags,
): Promise<number> {
  if (flags.fresh) {
    const removed = new CheckpointManager({
      path: config.checkpointPath,
      everyRequests: config.checkpointEveryRequests,
      intervalMs: config.checkpointIntervalMs,
    }).remove();

    if (removed) {
      log.info(`Removed checkpoint ${config.checkpointPath}, starting fresh`);
    }
  }

  const crawler = createNamespaceCrawler(config);

  try {
    const summary = await crawler.run();

    new ResultWriter(config.outputPath, flags.pretty).write(crawler.state.toOutput());
    log.info(`Results saved to ${config.outputPath}`);

    const namesPerRequest =
      summary.totalRequests > 0 ? summary.totalNames / summary.totalRequests : 0;

    console.log(
      formatJson(
        {
          totalNames: summary.totalNames,
          totalRequests: summary.totalRequests,
          exploredPrefixes: summary.exploredPrefixes,
          namesPerRequest: Number(namesPerRequest.toFixed(2)),
          durationMs: Math.round(summary.durationMs),
          interrupted: summary.interrupted,
          outputPath: config.outputPath,
        },
        flags.pretty,
      ),
    );

    return 0;
  } catch (error) {
    if (error instanceof CheckpointStorageError) {
      log.fatal('Crawl stopped: checkpoint storage failed.', error);
      return 1;
    }

    throw error;
  }
}
