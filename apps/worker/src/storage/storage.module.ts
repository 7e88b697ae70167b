import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { ARTIFACT_STORE } from './artifact-store.interface';
import { MinioArtifactStore } from './minio-artifact.store';
import { MINIO_CLIENT, STORAGE_OPTIONS, StorageOptions } from './storage.constants';

/**
 * StorageModule: provides the ArtifactStore, backed by MinIO.
 *
 * ConfigModule is imported here to guarantee ConfigService is available
 * to the factories even if consumers don't import it themselves.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MINIO_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Minio.Client =>
        new Minio.Client({
          endPoint: configService.get<string>('MINIO_ENDPOINT', 'localhost'),
          port: configService.get<number>('MINIO_PORT', 9000),
          useSSL: configService.get<boolean>('MINIO_USE_SSL', false),
          accessKey: configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
          secretKey: configService.get<string>(
            'MINIO_SECRET_KEY',
            'minioadmin_secret',
          ),
        }),
    },
    {
      provide: STORAGE_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): StorageOptions => ({
        bucket: configService.get<string>('MINIO_BUCKET', 'genforge-media'),
        publicBaseUrl: configService.get<string>(
          'STORAGE_PUBLIC_BASE_URL',
          'http://localhost:9000/genforge-media',
        ),
      }),
    },
    {
      provide: ARTIFACT_STORE,
      useClass: MinioArtifactStore,
    },
  ],
  exports: [ARTIFACT_STORE],
})
export class StorageModule {}
