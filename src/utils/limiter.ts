export type LaneConfig<Lane extends string> = Record<Lane, number>;

/**
 * Per-lane concurrency limiter. Waiters are served FIFO; a lane with
 * capacity 1 is a mutex.
 */
export class Limiter<Lane extends string> {
  private readonly queues = new Map<Lane, Array<() => void>>();
  private readonly running = new Map<Lane, number>();

  constructor(private readonly config: LaneConfig<Lane>) {}

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    await this.acquire(lane);
    try {
      return await fn();
    } finally {
      this.release(lane);
    }
  }

  activeCount(lane: Lane): number {
    return this.running.get(lane) ?? 0;
  }

  pendingCount(lane: Lane): number {
    return this.queueFor(lane).length;
  }

  private capacity(lane: Lane): number {
    const max = this.config[lane];
    return Number.isFinite(max) && max >= 1 ? Math.floor(max) : 1;
  }

  private queueFor(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }

  private acquire(lane: Lane): Promise<void> {
    const running = this.activeCount(lane);
    if (running < this.capacity(lane)) {
      this.running.set(lane, running + 1);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queueFor(lane).push(resolve);
    });
  }

  private release(lane: Lane): void {
    const next = this.queueFor(lane).shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
      return;
    }
    this.running.set(lane, Math.max(0, this.activeCount(lane) - 1));
  }
}

type SharedLane = 'llm';

const globalLimiter = new Limiter<SharedLane>({
  llm: Number(process.env.LLM_CONCURRENCY || '2'),
});

export function limit<T>(lane: SharedLane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
