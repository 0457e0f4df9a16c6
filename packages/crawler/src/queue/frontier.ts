import type { FrontierSeed, QueueItem } from './types.js';

type Waiter = {
  resolve: (pushed: boolean) => void;
  timer: NodeJS.Timeout;
};

function precedes(left: QueueItem, right: QueueItem): boolean {
  if (left.priority !== right.priority) {
    return left.priority < right.priority;
  }

  return left.sequence < right.sequence;
}

/**
 * Pending prefixes ordered by (priority, sequence).
 *
 * Popped items count as outstanding until `complete` is called, so
 * `isDrained` only reports true once nothing is queued and nobody is still
 * working on something that could push more.
 */
export class Frontier {
  private readonly heap: QueueItem[];
  private readonly queued: Set<string>;
  private readonly waiters: Waiter[];
  private sequence: number;
  private outstanding: number;
  private closed: boolean;

  constructor() {
    this.heap = [];
    this.queued = new Set();
    this.waiters = [];
    this.sequence = 0;
    this.outstanding = 0;
    this.closed = false;
  }

  push(prefix: string, priority: number): boolean {
    if (this.queued.has(prefix)) {
      return false;
    }

    this.heap.push({ priority, prefix, sequence: this.sequence });
    this.sequence += 1;
    this.queued.add(prefix);
    this.siftUp(this.heap.length - 1);
    this.notifyOne();

    return true;
  }

  pushAll(seeds: readonly FrontierSeed[]): number {
    let added = 0;

    for (const seed of seeds) {
      if (this.push(seed.prefix, seed.priority)) {
        added += 1;
      }
    }

    return added;
  }

  async pop(timeoutMs: number): Promise<QueueItem | undefined> {
    const deadline = performance.now() + timeoutMs;

    while (!this.closed) {
      const item = this.take();
      if (item) {
        return item;
      }

      const remaining = deadline - performance.now();
      if (remaining <= 0) {
        return undefined;
      }

      const pushed = await this.waitForPush(remaining);
      if (!pushed) {
        return this.closed ? undefined : this.take();
      }
    }

    return undefined;
  }

  complete(_item: QueueItem): void {
    this.outstanding = Math.max(0, this.outstanding - 1);
  }

  has(prefix: string): boolean {
    return this.queued.has(prefix);
  }

  isDrained(): boolean {
    return this.heap.length === 0 && this.outstanding === 0;
  }

  wakeAll(): void {
    const waiters = this.waiters.splice(0, this.waiters.length);

    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(false);
    }
  }

  close(): void {
    this.closed = true;
    this.wakeAll();
  }

  get size(): number {
    return this.heap.length;
  }

  get inFlight(): number {
    return this.outstanding;
  }

  private take(): QueueItem | undefined {
    const top = this.heap[0];
    if (!top) {
      return undefined;
    }

    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }

    this.queued.delete(top.prefix);
    this.outstanding += 1;

    return top;
  }

  private waitForPush(timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(false);
        }, timeoutMs),
      };

      this.waiters.push(waiter);
    });
  }

  private notifyOne(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }

  private siftUp(start: number): void {
    let index = start;

    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const item = this.heap[index];
      const parent = this.heap[parentIndex];
      if (!item || !parent || !precedes(item, parent)) {
        return;
      }

      this.heap[index] = parent;
      this.heap[parentIndex] = item;
      index = parentIndex;
    }
  }

  private siftDown(start: number): void {
    let index = start;

    for (;;) {
      const left = index * 2 + 1;
      const right = left + 1;
      let smallest = index;

      const leftItem = this.heap[left];
      const rightItem = this.heap[right];
      const smallestItem = this.heap[smallest];
      if (!smallestItem) {
        return;
      }

      let candidate = smallestItem;
      if (leftItem && precedes(leftItem, candidate)) {
        smallest = left;
        candidate = leftItem;
      }

      if (rightItem && precedes(rightItem, candidate)) {
        smallest = right;
        candidate = rightItem;
      }

      if (smallest === index) {
        return;
      }

      this.heap[smallest] = smallestItem;
      this.heap[index] = candidate;
      index = smallest;
    }
  }
}
