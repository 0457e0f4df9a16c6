type QueueItem = {
  priority: number;
  prefix: string;
  sequence: number;
};

type FrontierSeed = {
  prefix: string;
  priority: number;
};

export type { QueueItem, FrontierSeed };
