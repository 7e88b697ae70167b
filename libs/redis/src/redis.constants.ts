/**
 * Injection token for the shared ioredis command connection.
 *
 * String-based so that tests can swap the connection with `useValue`
 * without pulling a real client into the container.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';

/** Prefix for every key this service writes to Redis */
export const REDIS_KEY_PREFIX = 'genforge';
