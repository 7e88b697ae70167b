/**
 * TypeScript interfaces mirroring the generation.proto definitions.
 *
 * Hand-written to match the proto contract without a code-generation step.
 * @grpc/proto-loader parses the proto at runtime (keepCase: false, so
 * snake_case fields arrive camelCased); these types give compile-time safety
 * for the controller.
 */

// ── gRPC Timestamp ──────────────────────────────────────

export interface GrpcTimestamp {
  seconds: number;
  nanos: number;
}

// ── Request / Response Interfaces ───────────────────────

export interface GrpcGenerationParameters {
  width?: number;
  height?: number;
  steps?: number;
  guidanceScale?: number;
  seed?: number;
}

export interface CreateJobRequest {
  prompt: string;
  model?: string;
  parameters?: GrpcGenerationParameters;
}

export interface GetJobRequest {
  jobId: string;
}

export interface CancelJobRequest {
  jobId: string;
}

export interface GetJobMetadataRequest {
  jobId: string;
}

export interface GetJobArtifactRequest {
  jobId: string;
}

export interface ListJobsRequest {
  /** Empty string means no status filter */
  status?: string;
  limit?: number;
  offset?: number;
}

export interface JobResultMessage {
  path: string;
  url: string;
  sizeBytes: number;
}

export interface JobReply {
  jobId: string;
  prompt: string;
  model: string;
  status: string;
  externalHandle: string;
  retryCount: number;
  errorMessage: string;
  result?: JobResultMessage;
  createdAt: GrpcTimestamp;
  startedAt?: GrpcTimestamp;
  completedAt?: GrpcTimestamp;
}

export interface ListJobsReply {
  jobs: JobReply[];
}

export interface JobMetadataReply {
  jobId: string;
  metadataJson: string;
}

export interface JobArtifactReply {
  jobId: string;
  path: string;
  contentType: string;
  data: Buffer;
}

export interface SweepArtifactsRequest {
  olderThanSeconds?: number;
}

export interface SweepArtifactsReply {
  reclaimed: number;
  failed: number;
}
