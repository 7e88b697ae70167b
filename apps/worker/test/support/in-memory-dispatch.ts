import type { Lease } from '@genforge/redis';

/** Stand-in for RedisLeaseService: one holder per key, no expiry */
export class InMemoryLeaseService {
  readonly held = new Set<string>();
  readonly acquired: string[] = [];

  async acquire(key: string, _ttlMs: number): Promise<Lease | null> {
    if (this.held.has(key)) {
      return null;
    }
    this.held.add(key);
    this.acquired.push(key);
    const token = `token-${this.acquired.length}`;
    return {
      key,
      token,
      release: async () => this.held.delete(key),
    };
  }
}

/** Stand-in for RedisJobQueue with an explicit clock */
export class InMemoryJobQueue {
  /** jobId → due time (ms) */
  readonly due = new Map<string, number>();
  now = 0;

  async schedule(jobId: string, delayMs = 0): Promise<void> {
    this.due.set(jobId, this.now + Math.max(0, delayMs));
  }

  async scheduleIfAbsent(jobId: string): Promise<boolean> {
    if (this.due.has(jobId)) {
      return false;
    }
    this.due.set(jobId, this.now);
    return true;
  }

  async claimDue(limit: number): Promise<string[]> {
    const ready = [...this.due.entries()]
      .filter(([, dueAt]) => dueAt <= this.now)
      .sort((a, b) => a[1] - b[1])
      .slice(0, Math.max(0, limit))
      .map(([jobId]) => jobId);
    for (const jobId of ready) {
      this.due.delete(jobId);
    }
    return ready;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
