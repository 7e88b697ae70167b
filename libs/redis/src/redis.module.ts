import {
  DynamicModule,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisPublisherService } from './redis-publisher.service';
import { RedisLeaseService } from './redis-lease.service';

/**
 * RedisModule: global dynamic module providing one ioredis connection and
 * the services built on it.
 *
 * Usage:
 *   RedisModule.forRoot() : once, in AppModule
 *
 * Exports:
 *   - REDIS_CLIENT: the raw ioredis connection (job queue)
 *   - RedisPublisherService: publish(channel, payload)
 *   - RedisLeaseService: acquire(key, ttlMs) / release(key, token)
 */
@Module({})
export class RedisModule implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisModule.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          db: configService.get<number>('REDIS_DB', 0),
          // Retry strategy: back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: false,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider, RedisPublisherService, RedisLeaseService],
      exports: [REDIS_CLIENT, RedisPublisherService, RedisLeaseService],
      global: true,
    };
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
