import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import {
  CancelJobRequest,
  CreateJobRequest,
  GENERATION_JOB_SERVICE_NAME,
  GetJobArtifactRequest,
  GetJobMetadataRequest,
  GetJobRequest,
  JobArtifactReply,
  JobMetadataReply,
  JobReply,
  ListJobsReply,
  ListJobsRequest,
  SweepArtifactsReply,
  SweepArtifactsRequest,
} from '@genforge/proto';
import { JobsService } from '../jobs/jobs.service';
import { RetentionSweeperService } from '../retention/retention-sweeper.service';
import { contentTypeFor, extensionOf } from '../storage/artifact-store.interface';
import { toRpcException } from './grpc-error.mapper';
import { toJobReply } from './job-reply.mapper';

/**
 * gRPC controller for genforge.GenerationJobService.
 *
 * Proto3 cannot tell an empty string or zero from an unset field, so those
 * are treated as "not provided" before validation.
 */
@Controller()
export class GenerationJobsController {
  constructor(
    private readonly jobsService: JobsService,
    private readonly sweeper: RetentionSweeperService,
  ) {}

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'CreateJob')
  async createJob(request: CreateJobRequest): Promise<JobReply> {
    try {
      const job = await this.jobsService.create({
        prompt: request.prompt,
        model: request.model || undefined,
        parameters: request.parameters,
      });
      return toJobReply(job);
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'GetJob')
  async getJob(request: GetJobRequest): Promise<JobReply> {
    try {
      return toJobReply(await this.jobsService.findById(request.jobId));
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'ListJobs')
  async listJobs(request: ListJobsRequest): Promise<ListJobsReply> {
    try {
      const jobs = await this.jobsService.list({
        status: request.status || undefined,
        limit: request.limit || undefined,
        offset: request.offset || undefined,
      });
      return { jobs: jobs.map(toJobReply) };
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'CancelJob')
  async cancelJob(request: CancelJobRequest): Promise<JobReply> {
    try {
      return toJobReply(await this.jobsService.cancel(request.jobId));
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'GetJobMetadata')
  async getJobMetadata(request: GetJobMetadataRequest): Promise<JobMetadataReply> {
    try {
      const metadata = await this.jobsService.getMetadata(request.jobId);
      return { jobId: request.jobId, metadataJson: JSON.stringify(metadata) };
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'GetJobArtifact')
  async getJobArtifact(request: GetJobArtifactRequest): Promise<JobArtifactReply> {
    try {
      const artifact = await this.jobsService.getArtifact(request.jobId);
      return {
        jobId: artifact.job.id,
        path: artifact.path,
        contentType: contentTypeFor(extensionOf(artifact.path)),
        data: artifact.bytes,
      };
    } catch (error) {
      throw toRpcException(error);
    }
  }

  @GrpcMethod(GENERATION_JOB_SERVICE_NAME, 'SweepArtifacts')
  async sweepArtifacts(request: SweepArtifactsRequest): Promise<SweepArtifactsReply> {
    try {
      const olderThanSeconds = request.olderThanSeconds ?? 0;
      return await this.sweeper.sweep(
        olderThanSeconds > 0 ? olderThanSeconds * 1000 : undefined,
      );
    } catch (error) {
      throw toRpcException(error);
    }
  }
}
