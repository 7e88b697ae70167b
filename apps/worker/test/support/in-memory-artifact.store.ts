import {
  ArtifactMetadata,
  ArtifactStore,
  StoredArtifact,
  artifactKey,
  metadataKey,
} from '../../src/storage/artifact-store.interface';
import { ArtifactNotFoundException } from '../../src/storage/exceptions/storage.exceptions';

export const TEST_STORAGE_BASE_URL = 'https://storage.test/genforge-media';

/** ArtifactStore over Maps; `fail*` fields inject one-off errors */
export class InMemoryArtifactStore implements ArtifactStore {
  readonly objects = new Map<string, Buffer>();
  readonly metadata = new Map<string, ArtifactMetadata>();

  failNextPut: Error | null = null;
  failNextPutMetadata: Error | null = null;
  /** Job ids whose delete throws */
  readonly failDeleteFor = new Set<string>();

  async put(jobId: string, bytes: Buffer, ext: string): Promise<StoredArtifact> {
    if (this.failNextPut) {
      const error = this.failNextPut;
      this.failNextPut = null;
      throw error;
    }
    const key = artifactKey(jobId, ext);
    this.objects.set(key, Buffer.from(bytes));
    return { path: key, url: `${TEST_STORAGE_BASE_URL}/${key}` };
  }

  async putMetadata(jobId: string, metadata: ArtifactMetadata): Promise<string> {
    if (this.failNextPutMetadata) {
      const error = this.failNextPutMetadata;
      this.failNextPutMetadata = null;
      throw error;
    }
    const key = metadataKey(jobId);
    this.metadata.set(key, metadata);
    return key;
  }

  async get(jobId: string, ext: string): Promise<Buffer> {
    const key = artifactKey(jobId, ext);
    const bytes = this.objects.get(key);
    if (!bytes) {
      throw new ArtifactNotFoundException(key);
    }
    return bytes;
  }

  async getMetadata(jobId: string): Promise<ArtifactMetadata> {
    const key = metadataKey(jobId);
    const metadata = this.metadata.get(key);
    if (!metadata) {
      throw new ArtifactNotFoundException(key);
    }
    return metadata;
  }

  async delete(jobId: string, ext: string): Promise<boolean> {
    if (this.failDeleteFor.has(jobId)) {
      throw new Error(`simulated delete failure for ${jobId}`);
    }
    return this.objects.delete(artifactKey(jobId, ext));
  }
}
