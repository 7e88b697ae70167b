import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { RetentionModule } from '../retention/retention.module';
import { GenerationJobsController } from './generation-jobs.controller';

/**
 * GenerationJobsModule: gRPC surface of the worker.
 *
 * Exposes job creation, queries, cancellation and on-demand retention sweeps
 * through the genforge.GenerationJobService proto service.
 */
@Module({
  imports: [JobsModule, RetentionModule],
  controllers: [GenerationJobsController],
})
export class GenerationJobsModule {}
