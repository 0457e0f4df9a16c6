import { existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatJson } from '../utils/json.js';
import type { CrawlOutput } from './types.js';

/** Writes the final name list through a temporary file and a rename. */
export class ResultWriter {
  private readonly outputPath: string;
  private readonly tmpPath: string;
  private readonly pretty: boolean;

  constructor(outputPath: string, pretty = false) {
    this.outputPath = outputPath;
    this.tmpPath = `${outputPath}.tmp`;
    this.pretty = pretty;
  }

  write(output: CrawlOutput): void {
    const dir = dirname(this.outputPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(this.tmpPath, formatJson(output, this.pretty) + '\n', 'utf-8');
    renameSync(this.tmpPath, this.outputPath);
  }

  get path(): string {
    return this.outputPath;
  }
}
