/** NestJS injection token for the ArtifactStore implementation */
export const ARTIFACT_STORE = 'ARTIFACT_STORE';

export const DEFAULT_ARTIFACT_EXTENSION = 'png';

export interface StoredArtifact {
  /** Storage key, e.g. `artifacts/{jobId}.png` */
  path: string;
  /** Publicly resolvable URL of the stored object */
  url: string;
}

export type ArtifactMetadata = Record<string, unknown>;

/**
 * Byte and metadata storage addressed by job id.
 *
 * Writes overwrite whatever is stored under the same key, so repeating a
 * write after a crash is harmless. Failures surface as TransientException or
 * FatalException; reads of a missing key as ArtifactNotFoundException.
 */
export interface ArtifactStore {
  put(jobId: string, bytes: Buffer, ext: string): Promise<StoredArtifact>;
  putMetadata(jobId: string, metadata: ArtifactMetadata): Promise<string>;
  get(jobId: string, ext: string): Promise<Buffer>;
  getMetadata(jobId: string): Promise<ArtifactMetadata>;
  /** @returns false when nothing was stored under the key */
  delete(jobId: string, ext: string): Promise<boolean>;
}

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  json: 'application/json',
};

export function contentTypeFor(ext: string): string {
  return CONTENT_TYPES[ext] ?? 'application/octet-stream';
}

// ── Key layout ──────────────────────────────────────────

export function artifactKey(jobId: string, ext: string): string {
  return `artifacts/${jobId}.${ext}`;
}

export function metadataKey(jobId: string): string {
  return `metadata/${jobId}.json`;
}

/**
 * Lower-cased extension of the last path segment of a URL or key, or the
 * default when it has none.
 */
export function extensionOf(pathOrUrl: string): string {
  const pathname = URL.canParse(pathOrUrl)
    ? new URL(pathOrUrl).pathname
    : pathOrUrl;

  const lastSegment = pathname.split('/').pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot <= 0 || dot === lastSegment.length - 1) {
    return DEFAULT_ARTIFACT_EXTENSION;
  }

  const ext = lastSegment.slice(dot + 1).toLowerCase();
  return /^[a-z0-9]{1,8}$/.test(ext) ? ext : DEFAULT_ARTIFACT_EXTENSION;
}
