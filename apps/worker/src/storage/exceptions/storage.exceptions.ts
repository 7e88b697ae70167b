/** Thrown by artifact reads when no object exists under the job's key */
export class ArtifactNotFoundException extends Error {
  constructor(
    public readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`Artifact "${key}" not found`, options);
    this.name = 'ArtifactNotFoundException';
  }
}
