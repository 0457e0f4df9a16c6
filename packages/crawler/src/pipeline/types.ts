type LengthStats = {
  success: number;
  queries: number;
};

type CheckpointRecord = {
  discovered_names: string[];
  explored_prefixes: string[];
  request_count: number;
  timestamp: number;
  prefix_length_stats: Record<string, LengthStats>;
};

type CrawlOutput = {
  total_requests: number;
  total_names: number;
  names: string[];
};

type LengthStatsRow = LengthStats & {
  length: number;
  successRate: number;
};

export type { LengthStats, CheckpointRecord, CrawlOutput, LengthStatsRow };
