import { Module } from '@nestjs/common';
import { DatabaseModule } from '@genforge/database';
import { JOB_STORE } from './job-store';
import { TypeOrmJobStore } from './typeorm-job.store';
import { JobEventsPublisher } from './job-events.publisher';
import { JobsService } from './jobs.service';
import { QueueModule } from '../queue/queue.module';
import { StorageModule } from '../storage/storage.module';

/**
 * JobsModule: job persistence, status events and the caller-facing job
 * operations.
 *
 * Exports JOB_STORE and JobEventsPublisher for the orchestrator and the
 * retention sweeper.
 */
@Module({
  imports: [DatabaseModule.forFeature(), QueueModule, StorageModule],
  providers: [
    {
      provide: JOB_STORE,
      useClass: TypeOrmJobStore,
    },
    JobEventsPublisher,
    JobsService,
  ],
  exports: [JOB_STORE, JobEventsPublisher, JobsService],
})
export class JobsModule {}
