import { Injectable, Inject, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { REDIS_CLIENT } from './redis.constants';

/**
 * Deletes the lease key only while it still holds our token, so a holder
 * whose lease already expired cannot release somebody else's lease.
 */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

/** A held lease; release() is safe to call more than once */
export interface Lease {
  readonly key: string;
  readonly token: string;
  release(): Promise<boolean>;
}

/**
 * RedisLeaseService: mutual exclusion keyed by an arbitrary string, with a
 * TTL so a crashed holder cannot block the key forever.
 *
 * Acquire is `SET key token PX ttl NX`; release is a compare-and-delete
 * script on the random token.
 */
@Injectable()
export class RedisLeaseService {
  private readonly logger = new Logger(RedisLeaseService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  /**
   * Tries to take the lease once.
   *
   * @returns the held lease, or null when another holder owns the key
   */
  async acquire(key: string, ttlMs: number): Promise<Lease | null> {
    const token = randomUUID();
    const reply = await this.client.set(key, token, 'PX', ttlMs, 'NX');

    if (reply !== 'OK') {
      this.logger.debug(`Lease "${key}" is held elsewhere`);
      return null;
    }

    this.logger.debug(`Acquired lease "${key}" for ${ttlMs}ms`);
    return {
      key,
      token,
      release: () => this.release(key, token),
    };
  }

  /**
   * Releases the lease if `token` still owns it.
   *
   * @returns false when the lease had already expired or changed hands
   */
  async release(key: string, token: string): Promise<boolean> {
    const removed = await this.client.eval(RELEASE_SCRIPT, 1, key, token);
    const released = removed === 1;

    if (!released) {
      this.logger.warn(`Lease "${key}" expired before release`);
    }
    return released;
  }
}
