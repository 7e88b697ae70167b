/** NestJS injection token for the MinIO client */
export const MINIO_CLIENT = 'MINIO_CLIENT';

/** NestJS injection token for the resolved storage location */
export const STORAGE_OPTIONS = 'STORAGE_OPTIONS';

export interface StorageOptions {
  bucket: string;
  /** Base of the public artifact URLs, without a trailing slash */
  publicBaseUrl: string;
}
