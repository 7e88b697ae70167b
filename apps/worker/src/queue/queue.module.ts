import { Module } from '@nestjs/common';
import { RedisJobQueue } from './redis-job-queue';

/** RedisJobQueue over the global REDIS_CLIENT from RedisModule.forRoot() */
@Module({
  providers: [RedisJobQueue],
  exports: [RedisJobQueue],
})
export class QueueModule {}
