import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { StorageModule } from '../storage/storage.module';
import { RetentionSweeperService } from './retention-sweeper.service';

@Module({
  imports: [JobsModule, StorageModule],
  providers: [RetentionSweeperService],
  exports: [RetentionSweeperService],
})
export class RetentionModule {}
