import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  GENERATION_CLIENT,
  GenerationClient,
} from './generation-client.interface';
import { ReplicateGenerationClient } from './replicate-generation.client';
import { MockGenerationClient } from './mock-generation.client';

/**
 * Picks the GenerationClient once, at wiring time, from GENERATION_PROVIDER.
 */
export function generationClientFactory(
  configService: ConfigService,
): GenerationClient {
  const logger = new Logger('GenerationModule');
  const provider = configService.get<string>('GENERATION_PROVIDER', 'mock');

  if (provider === 'replicate') {
    logger.log('Using Replicate generation client');
    return new ReplicateGenerationClient({
      apiToken: configService.getOrThrow<string>('REPLICATE_API_TOKEN'),
      baseUrl: configService.get<string>(
        'REPLICATE_API_BASE_URL',
        'https://api.replicate.com/v1',
      ),
      defaultModel: configService.get<string>(
        'REPLICATE_DEFAULT_MODEL',
        'black-forest-labs/flux-schnell',
      ),
      requestTimeoutMs:
        configService.get<number>('GENERATION_REQUEST_TIMEOUT_SEC', 30) * 1000,
    });
  }

  logger.warn('Using mock generation client: outputs are placeholders');
  return new MockGenerationClient({
    delayMinMs: configService.get<number>('MOCK_DELAY_MIN_MS', 200),
    delayMaxMs: configService.get<number>('MOCK_DELAY_MAX_MS', 1000),
    failureRate: configService.get<number>('MOCK_FAILURE_RATE', 0.1),
    pollsToComplete: configService.get<number>('MOCK_POLLS_TO_COMPLETE', 2),
  });
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: GENERATION_CLIENT,
      inject: [ConfigService],
      useFactory: generationClientFactory,
    },
  ],
  exports: [GENERATION_CLIENT],
})
export class GenerationModule {}
