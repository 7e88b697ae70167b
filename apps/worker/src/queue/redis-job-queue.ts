import { Inject, Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT, REDIS_KEY_PREFIX } from '@genforge/redis';

/** Sorted set of job ids scored by the epoch millisecond they become due */
export const SCHEDULED_JOBS_KEY = `${REDIS_KEY_PREFIX}:jobs:scheduled`;

/**
 * RedisJobQueue: durable delay queue of job ids.
 *
 * Scheduling an id that is already queued moves its due time; claiming is
 * ZRANGEBYSCORE followed by ZREM per id, and only the caller whose ZREM
 * removed the id owns it, so two workers never claim the same entry.
 */
@Injectable()
export class RedisJobQueue {
  private readonly logger = new Logger(RedisJobQueue.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  async schedule(jobId: string, delayMs = 0): Promise<void> {
    const dueAt = Date.now() + Math.max(0, delayMs);
    await this.client.zadd(SCHEDULED_JOBS_KEY, dueAt, jobId);
    this.logger.debug(`Scheduled job ${jobId} in ${delayMs}ms`);
  }

  /**
   * Queues the id for immediate processing unless it is already queued.
   *
   * @returns true when the id was added
   */
  async scheduleIfAbsent(jobId: string): Promise<boolean> {
    const added = await this.client.zadd(SCHEDULED_JOBS_KEY, 'NX', Date.now(), jobId);
    return added === 1;
  }

  /** Claims up to `limit` ids whose due time has passed */
  async claimDue(limit: number): Promise<string[]> {
    if (limit <= 0) {
      return [];
    }

    const candidates = await this.client.zrangebyscore(
      SCHEDULED_JOBS_KEY,
      '-inf',
      Date.now(),
      'LIMIT',
      0,
      limit,
    );

    const claimed: string[] = [];
    for (const jobId of candidates) {
      const removed = await this.client.zrem(SCHEDULED_JOBS_KEY, jobId);
      if (removed === 1) {
        claimed.push(jobId);
      }
    }
    return claimed;
  }
}
