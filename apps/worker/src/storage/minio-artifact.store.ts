import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as Minio from 'minio';
import { Readable } from 'stream';
import {
  ArtifactMetadata,
  ArtifactStore,
  StoredArtifact,
  artifactKey,
  contentTypeFor,
  metadataKey,
} from './artifact-store.interface';
import { MINIO_CLIENT, STORAGE_OPTIONS, StorageOptions } from './storage.constants';
import { ArtifactNotFoundException } from './exceptions/storage.exceptions';
import {
  FatalException,
  TransientException,
} from '../common/exceptions/collaborator.exceptions';
import {
  errorCode,
  errorMessage,
  isNetworkError,
} from '../common/exceptions/error-details';

/** S3 error codes meaning the object (or bucket) does not exist */
const NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  'NoSuchKey',
  'NotFound',
  'NoSuchBucket',
]);

/** S3 error codes worth retrying */
const RETRYABLE_S3_CODES: ReadonlySet<string> = new Set([
  'InternalError',
  'ServiceUnavailable',
  'SlowDown',
  'RequestTimeout',
]);

/**
 * MinioArtifactStore: ArtifactStore backed by MinIO (S3-compatible).
 *
 * Object key pattern:  artifacts/{jobId}.{ext}   metadata/{jobId}.json
 * Public URL:          {STORAGE_PUBLIC_BASE_URL}/{key}
 */
@Injectable()
export class MinioArtifactStore implements ArtifactStore, OnModuleInit {
  private readonly logger = new Logger(MinioArtifactStore.name);

  constructor(
    @Inject(MINIO_CLIENT)
    private readonly client: Minio.Client,

    @Inject(STORAGE_OPTIONS)
    private readonly options: StorageOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.ensureBucketExists();
    this.logger.log(`MinioArtifactStore ready: bucket: "${this.options.bucket}"`);
  }

  async put(jobId: string, bytes: Buffer, ext: string): Promise<StoredArtifact> {
    const key = artifactKey(jobId, ext);
    await this.putObject(key, bytes, contentTypeFor(ext));

    this.logger.log(`Stored artifact "${key}" (${bytes.length} bytes)`);
    return { path: key, url: this.publicUrl(key) };
  }

  async putMetadata(jobId: string, metadata: ArtifactMetadata): Promise<string> {
    const key = metadataKey(jobId);
    const body = Buffer.from(JSON.stringify(metadata, null, 2), 'utf8');
    await this.putObject(key, body, contentTypeFor('json'));

    this.logger.debug(`Stored metadata "${key}"`);
    return key;
  }

  get(jobId: string, ext: string): Promise<Buffer> {
    return this.getObject(artifactKey(jobId, ext));
  }

  async getMetadata(jobId: string): Promise<ArtifactMetadata> {
    const key = metadataKey(jobId);
    const body = await this.getObject(key);
    const parsed: unknown = JSON.parse(body.toString('utf8'));

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new FatalException(`Metadata "${key}" is not a JSON object`);
    }
    return { ...parsed };
  }

  async delete(jobId: string, ext: string): Promise<boolean> {
    const key = artifactKey(jobId, ext);

    try {
      await this.client.statObject(this.options.bucket, key);
    } catch (error) {
      if (this.isNotFound(error)) {
        this.logger.debug(`Artifact "${key}" already absent`);
        return false;
      }
      throw this.toStorageException(`stat "${key}"`, error);
    }

    try {
      await this.client.removeObject(this.options.bucket, key);
    } catch (error) {
      throw this.toStorageException(`delete "${key}"`, error);
    }

    this.logger.log(`Deleted artifact "${key}"`);
    return true;
  }

  // ── Helpers ────────────────────────────────────────────────

  private publicUrl(key: string): string {
    return `${this.options.publicBaseUrl}/${key}`;
  }

  private async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.client.putObject(this.options.bucket, key, body, body.length, {
        'Content-Type': contentType,
      });
    } catch (error) {
      this.logger.error(`Failed to upload "${key}" to MinIO: ${errorMessage(error)}`);
      throw this.toStorageException(`upload "${key}"`, error);
    }
  }

  private async getObject(key: string): Promise<Buffer> {
    let stream: Readable;
    try {
      stream = await this.client.getObject(this.options.bucket, key);
    } catch (error) {
      if (this.isNotFound(error)) {
        throw new ArtifactNotFoundException(key, { cause: error });
      }
      throw this.toStorageException(`read "${key}"`, error);
    }

    try {
      return await readAll(stream);
    } catch (error) {
      throw this.toStorageException(`read "${key}"`, error);
    }
  }

  private isNotFound(error: unknown): boolean {
    const code = errorCode(error);
    return code !== undefined && NOT_FOUND_CODES.has(code);
  }

  private toStorageException(
    action: string,
    error: unknown,
  ): TransientException | FatalException {
    const message = `Failed to ${action}: ${errorMessage(error)}`;
    const code = errorCode(error);

    if (isNetworkError(error) || (code !== undefined && RETRYABLE_S3_CODES.has(code))) {
      return new TransientException(message, { cause: error });
    }
    return new FatalException(message, { cause: error });
  }

  /**
   * Creates the bucket if it does not already exist.
   */
  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.options.bucket);
      if (!exists) {
        await this.client.makeBucket(this.options.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.options.bucket}"`);
      }
    } catch (error) {
      // Non-fatal during init: writes fail later with a storage error
      this.logger.error(
        `Failed to ensure bucket "${this.options.bucket}" exists: ${errorMessage(error)}`,
      );
    }
  }
}

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
