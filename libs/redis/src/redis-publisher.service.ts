import { Injectable, Inject, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisPublisherService: thin wrapper around the ioredis connection for
 * PubSub publishing.
 *
 * Responsibilities:
 * - Publish JSON-serialized payloads to named Redis PubSub channels
 * - Enforce the channel naming convention: {domain}:{id}:{type}
 *
 * The connection itself is shared with the lease and queue code and is
 * closed by RedisModule on shutdown.
 */
@Injectable()
export class RedisPublisherService {
  private readonly logger = new Logger(RedisPublisherService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  /**
   * Builds a channel key following the {domain}:{id}:{type} convention.
   */
  static channel(domain: string, id: string, type: string): string {
    return `${domain}:${id}:${type}`;
  }

  /**
   * Publishes a JSON-serialized payload to a Redis PubSub channel.
   *
   * @param channel - channel key, e.g. `job:abc-123:status`
   * @returns number of subscribers that received the message
   */
  async publish<T extends object>(channel: string, payload: T): Promise<number> {
    const message = JSON.stringify(payload);
    const receiverCount = await this.client.publish(channel, message);

    this.logger.debug(
      `Published to channel "${channel}": ${receiverCount} receiver(s)`,
    );

    return receiverCount;
  }
}
