import { Test } from '@nestjs/testing';
import { RpcException } from '@nestjs/microservices';
import { status } from '@grpc/grpc-js';
import { GenerationJobStatus } from '@genforge/database';
import { GenerationJobsController } from './generation-jobs.controller';
import { toGrpcTimestamp } from './job-reply.mapper';
import { JobsService } from '../jobs/jobs.service';
import { RetentionSweeperService } from '../retention/retention-sweeper.service';
import {
  InvalidTransitionException,
  JobNotCompletedException,
  JobNotFoundException,
  JobValidationException,
} from '../jobs/exceptions/job.exceptions';
import { TransientException } from '../common/exceptions/collaborator.exceptions';
import { buildJob } from '../../test/support/in-memory-job.store';

async function setup() {
  const jobsService = {
    create: jest.fn(),
    findById: jest.fn(),
    list: jest.fn(),
    cancel: jest.fn(),
    getMetadata: jest.fn(),
    getArtifact: jest.fn(),
  };
  const sweeper = { sweep: jest.fn() };

  const moduleRef = await Test.createTestingModule({
    controllers: [GenerationJobsController],
    providers: [
      { provide: JobsService, useValue: jobsService },
      { provide: RetentionSweeperService, useValue: sweeper },
    ],
  }).compile();

  return { controller: moduleRef.get(GenerationJobsController), jobsService, sweeper };
}

async function rpcError(run: Promise<unknown>): Promise<string | object> {
  try {
    await run;
  } catch (error) {
    if (error instanceof RpcException) {
      return error.getError();
    }
    throw error;
  }
  throw new Error('expected an RpcException');
}

describe('GenerationJobsController', () => {
  describe('createJob', () => {
    it('treats an empty model as unset and replies with the new job', async () => {
      const { controller, jobsService } = await setup();
      const createdAt = new Date('2026-01-02T03:04:05.678Z');
      const job = buildJob({ id: 'job-1', prompt: 'a fox', createdAt });
      jobsService.create.mockResolvedValue(job);

      const reply = await controller.createJob({ prompt: 'a fox', model: '' });

      expect(jobsService.create).toHaveBeenCalledWith({
        prompt: 'a fox',
        model: undefined,
        parameters: undefined,
      });
      expect(reply).toEqual({
        jobId: 'job-1',
        prompt: 'a fox',
        model: 'stable-diffusion',
        status: 'pending',
        externalHandle: '',
        retryCount: 0,
        errorMessage: '',
        createdAt: { seconds: 1767323045, nanos: 678_000_000 },
      });
    });

    it('maps validation errors to INVALID_ARGUMENT', async () => {
      const { controller, jobsService } = await setup();
      jobsService.create.mockRejectedValue(
        new JobValidationException(['prompt: prompt should not be empty']),
      );

      await expect(rpcError(controller.createJob({ prompt: '' }))).resolves.toEqual({
        code: status.INVALID_ARGUMENT,
        message: 'prompt: prompt should not be empty',
      });
    });
  });

  describe('getJob', () => {
    it('includes the result and timestamps of a completed job', async () => {
      const { controller, jobsService } = await setup();
      const startedAt = new Date('2026-01-02T03:04:05.000Z');
      const completedAt = new Date('2026-01-02T03:04:35.250Z');
      jobsService.findById.mockResolvedValue(
        buildJob({
          id: 'job-1',
          status: GenerationJobStatus.COMPLETED,
          externalHandle: 'ext-1',
          retryCount: 1,
          resultPath: 'artifacts/job-1.png',
          resultUrl: 'https://cdn.test/artifacts/job-1.png',
          resultSizeBytes: 1024,
          startedAt,
          completedAt,
        }),
      );

      const reply = await controller.getJob({ jobId: 'job-1' });

      expect(reply.result).toEqual({
        path: 'artifacts/job-1.png',
        url: 'https://cdn.test/artifacts/job-1.png',
        sizeBytes: 1024,
      });
      expect(reply.startedAt).toEqual(toGrpcTimestamp(startedAt));
      expect(reply.completedAt).toEqual({ seconds: 1767323075, nanos: 250_000_000 });
      expect(reply.externalHandle).toBe('ext-1');
    });

    it('maps a missing job to NOT_FOUND', async () => {
      const { controller, jobsService } = await setup();
      jobsService.findById.mockRejectedValue(new JobNotFoundException('job-9'));

      await expect(rpcError(controller.getJob({ jobId: 'job-9' }))).resolves.toEqual({
        code: status.NOT_FOUND,
        message: 'Generation job job-9 not found',
      });
    });

    it('hides unexpected errors behind INTERNAL', async () => {
      const { controller, jobsService } = await setup();
      jobsService.findById.mockRejectedValue(new Error('relation does not exist'));

      await expect(rpcError(controller.getJob({ jobId: 'job-1' }))).resolves.toEqual({
        code: status.INTERNAL,
        message: 'Internal error',
      });
    });
  });

  describe('listJobs', () => {
    it('treats proto defaults as unset filters', async () => {
      const { controller, jobsService } = await setup();
      jobsService.list.mockResolvedValue([buildJob({ id: 'job-1' })]);

      const reply = await controller.listJobs({ status: '', limit: 0, offset: 0 });

      expect(jobsService.list).toHaveBeenCalledWith({
        status: undefined,
        limit: undefined,
        offset: undefined,
      });
      expect(reply.jobs.map((job) => job.jobId)).toEqual(['job-1']);
    });
  });

  describe('cancelJob', () => {
    it('maps a terminal job to FAILED_PRECONDITION', async () => {
      const { controller, jobsService } = await setup();
      jobsService.cancel.mockRejectedValue(
        new InvalidTransitionException(
          GenerationJobStatus.COMPLETED,
          GenerationJobStatus.CANCELLED,
        ),
      );

      await expect(rpcError(controller.cancelJob({ jobId: 'job-1' }))).resolves.toEqual({
        code: status.FAILED_PRECONDITION,
        message: 'Invalid job status transition: completed -> cancelled',
      });
    });
  });

  describe('getJobMetadata', () => {
    it('returns the record as JSON', async () => {
      const { controller, jobsService } = await setup();
      jobsService.getMetadata.mockResolvedValue({ jobId: 'job-1', sizeBytes: 1024 });

      await expect(controller.getJobMetadata({ jobId: 'job-1' })).resolves.toEqual({
        jobId: 'job-1',
        metadataJson: '{"jobId":"job-1","sizeBytes":1024}',
      });
    });
  });

  describe('getJobArtifact', () => {
    it('returns the bytes with their content type', async () => {
      const { controller, jobsService } = await setup();
      const bytes = Buffer.from('jpeg bytes');
      jobsService.getArtifact.mockResolvedValue({
        job: buildJob({ id: 'job-1' }),
        path: 'artifacts/job-1.jpg',
        bytes,
      });

      await expect(controller.getJobArtifact({ jobId: 'job-1' })).resolves.toEqual({
        jobId: 'job-1',
        path: 'artifacts/job-1.jpg',
        contentType: 'image/jpeg',
        data: bytes,
      });
    });

    it('maps an unfinished job to FAILED_PRECONDITION', async () => {
      const { controller, jobsService } = await setup();
      jobsService.getArtifact.mockRejectedValue(
        new JobNotCompletedException('job-1', GenerationJobStatus.PROCESSING),
      );

      await expect(rpcError(controller.getJobArtifact({ jobId: 'job-1' }))).resolves.toEqual({
        code: status.FAILED_PRECONDITION,
        message: 'Generation job job-1 is processing, not completed',
      });
    });

    it('maps a storage outage to UNAVAILABLE', async () => {
      const { controller, jobsService } = await setup();
      jobsService.getArtifact.mockRejectedValue(new TransientException('storage unreachable'));

      await expect(rpcError(controller.getJobArtifact({ jobId: 'job-1' }))).resolves.toEqual({
        code: status.UNAVAILABLE,
        message: 'storage unreachable',
      });
    });
  });

  describe('sweepArtifacts', () => {
    it('uses the configured age unless one is given', async () => {
      const { controller, sweeper } = await setup();
      sweeper.sweep.mockResolvedValue({ reclaimed: 2, failed: 1 });

      await expect(controller.sweepArtifacts({ olderThanSeconds: 0 })).resolves.toEqual({
        reclaimed: 2,
        failed: 1,
      });
      await controller.sweepArtifacts({ olderThanSeconds: 3600 });

      expect(sweeper.sweep).toHaveBeenNthCalledWith(1, undefined);
      expect(sweeper.sweep).toHaveBeenNthCalledWith(2, 3_600_000);
    });
  });
});
