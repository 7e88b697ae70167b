import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { QueueModule } from '../queue/queue.module';
import { OrchestrationModule } from '../orchestration/orchestration.module';
import { JobDispatcherService } from './job-dispatcher.service';

/** Drives queued jobs through the orchestrator; RedisLeaseService comes from the global RedisModule */
@Module({
  imports: [JobsModule, QueueModule, OrchestrationModule],
  providers: [JobDispatcherService],
  exports: [JobDispatcherService],
})
export class DispatchModule {}
