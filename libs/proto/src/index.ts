/**
 * @genforge/proto
 *
 * Protobuf definition and TypeScript interfaces of the generation job API.
 *
 * - The proto file is consumed at runtime by @grpc/proto-loader
 * - TypeScript interfaces provide compile-time type safety
 * - gRPC exceptions provide a shared error contract
 */
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

/** Absolute path to the generation job proto file */
export const GENERATION_PROTO_PATH: string = join(
  __dirname,
  'generation.proto',
);

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const GENFORGE_PACKAGE_NAME = 'genforge';

/** Service name of the generation job gRPC service */
export const GENERATION_JOB_SERVICE_NAME = 'GenerationJobService';

// ── TypeScript Interfaces ───────────────────────────────

export type {
  GrpcTimestamp,
  GrpcGenerationParameters,
  CreateJobRequest,
  GetJobRequest,
  CancelJobRequest,
  GetJobMetadataRequest,
  GetJobArtifactRequest,
  ListJobsRequest,
  JobResultMessage,
  JobReply,
  ListJobsReply,
  JobMetadataReply,
  JobArtifactReply,
  SweepArtifactsRequest,
  SweepArtifactsReply,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcNotFoundException,
  GrpcInvalidArgumentException,
  GrpcFailedPreconditionException,
  GrpcInternalException,
  GrpcUnavailableException,
} from './grpc-exceptions';
