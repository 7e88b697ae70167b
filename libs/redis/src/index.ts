/**
 * @genforge/redis
 *
 * Shared Redis infrastructure for the worker.
 *
 * Exports:
 *   - RedisModule.forRoot() : import once in AppModule
 *   - RedisPublisherService : publish events to channels
 *   - RedisLeaseService     : TTL-bounded mutual exclusion per key
 *   - REDIS_CLIENT          : ioredis injection token
 */
export { RedisModule } from './redis.module';
export { RedisPublisherService } from './redis-publisher.service';
export { RedisLeaseService } from './redis-lease.service';
export type { Lease } from './redis-lease.service';
export { REDIS_CLIENT, REDIS_KEY_PREFIX } from './redis.constants';
