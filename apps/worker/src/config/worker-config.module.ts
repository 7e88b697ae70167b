import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DISPATCH_SETTINGS,
  ORCHESTRATION_SETTINGS,
  RETENTION_SETTINGS,
  RETRY_SETTINGS,
  dispatchSettingsFactory,
  orchestrationSettingsFactory,
  retentionSettingsFactory,
  retrySettingsFactory,
} from './worker-settings';

/**
 * Typed settings objects built once from the validated environment.
 */
@Global()
@Module({
  providers: [
    {
      provide: ORCHESTRATION_SETTINGS,
      inject: [ConfigService],
      useFactory: orchestrationSettingsFactory,
    },
    {
      provide: RETRY_SETTINGS,
      inject: [ConfigService],
      useFactory: retrySettingsFactory,
    },
    {
      provide: DISPATCH_SETTINGS,
      inject: [ConfigService],
      useFactory: dispatchSettingsFactory,
    },
    {
      provide: RETENTION_SETTINGS,
      inject: [ConfigService],
      useFactory: retentionSettingsFactory,
    },
  ],
  exports: [
    ORCHESTRATION_SETTINGS,
    RETRY_SETTINGS,
    DISPATCH_SETTINGS,
    RETENTION_SETTINGS,
  ],
})
export class WorkerConfigModule {}
