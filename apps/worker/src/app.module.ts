import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RedisModule } from '@genforge/redis';
import { validateEnv } from './config/env.validation';
import { WorkerConfigModule } from './config/worker-config.module';
import { HealthModule } from './health/health.module';
import { DispatchModule } from './dispatch/dispatch.module';
import { GenerationJobsModule } from './generation-jobs/generation-jobs.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnv,
    }),
    WorkerConfigModule,

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: configService.get<number>('POSTGRES_PORT', 5432),
        username: configService.get<string>('POSTGRES_USER', 'genforge'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'genforge_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'genforge'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') === 'development',
      }),
    }),

    // ── Redis (lease, queue, status events) ──────────────
    RedisModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    DispatchModule,
    GenerationJobsModule,
  ],
})
export class AppModule {}
