import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { GenerationModule } from '../generation/generation.module';
import { StorageModule } from '../storage/storage.module';
import { OrchestratorService } from './orchestrator.service';

@Module({
  imports: [JobsModule, GenerationModule, StorageModule],
  providers: [OrchestratorService],
  exports: [OrchestratorService],
})
export class OrchestrationModule {}
