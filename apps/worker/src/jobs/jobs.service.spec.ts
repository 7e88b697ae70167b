import { Test } from '@nestjs/testing';
import { GenerationJobStatus } from '@genforge/database';
import { RedisPublisherService } from '@genforge/redis';
import { JobsService } from './jobs.service';
import { JOB_STORE } from './job-store';
import { JobEventsPublisher } from './job-events.publisher';
import {
  InvalidTransitionException,
  JobNotCompletedException,
  JobNotFoundException,
  JobValidationException,
  StaleJobUpdateException,
} from './exceptions/job.exceptions';
import { RedisJobQueue } from '../queue/redis-job-queue';
import { ARTIFACT_STORE } from '../storage/artifact-store.interface';
import { ArtifactNotFoundException } from '../storage/exceptions/storage.exceptions';
import { InMemoryJobStore } from '../../test/support/in-memory-job.store';
import { InMemoryArtifactStore } from '../../test/support/in-memory-artifact.store';
import { InMemoryJobQueue } from '../../test/support/in-memory-dispatch';

async function setup() {
  const store = new InMemoryJobStore();
  const artifacts = new InMemoryArtifactStore();
  const queue = new InMemoryJobQueue();
  const publisher = { publish: jest.fn().mockResolvedValue(1) };

  const moduleRef = await Test.createTestingModule({
    providers: [
      JobsService,
      JobEventsPublisher,
      { provide: JOB_STORE, useValue: store },
      { provide: ARTIFACT_STORE, useValue: artifacts },
      { provide: RedisJobQueue, useValue: queue },
      { provide: RedisPublisherService, useValue: publisher },
    ],
  }).compile();

  return { service: moduleRef.get(JobsService), store, artifacts, queue, publisher };
}

async function validationErrors(run: Promise<unknown>): Promise<string[]> {
  try {
    await run;
  } catch (error) {
    if (error instanceof JobValidationException) {
      return error.errors;
    }
    throw error;
  }
  throw new Error('expected a validation failure');
}

describe('JobsService', () => {
  describe('create', () => {
    it('stores a pending job and queues it', async () => {
      const { service, store, queue } = await setup();

      const job = await service.create({
        prompt: 'a red fox in snow',
        parameters: { width: 512, guidanceScale: 7.5 },
      });

      expect(job).toMatchObject({
        prompt: 'a red fox in snow',
        model: 'stable-diffusion',
        parameters: { width: 512, guidanceScale: 7.5 },
        status: GenerationJobStatus.PENDING,
        retryCount: 0,
        externalHandle: null,
      });
      expect(store.get(job.id).status).toBe(GenerationJobStatus.PENDING);
      expect(queue.due.get(job.id)).toBe(0);
    });

    it('keeps an explicit model', async () => {
      const { service } = await setup();

      const job = await service.create({
        prompt: 'a red fox in snow',
        model: 'stability-ai/sdxl:7762fd07',
      });

      expect(job.model).toBe('stability-ai/sdxl:7762fd07');
      expect(job.parameters).toEqual({});
    });

    it('drops parameters it does not know', async () => {
      const { service } = await setup();

      const job = await service.create({
        prompt: 'a red fox in snow',
        parameters: { steps: 20, sampler: 'euler' },
      });

      expect(job.parameters).toEqual({ steps: 20 });
    });

    it('returns the job even when queueing fails', async () => {
      const { service, store, queue } = await setup();
      jest.spyOn(queue, 'schedule').mockRejectedValue(new Error('redis down'));

      const job = await service.create({ prompt: 'a red fox in snow' });

      expect(store.get(job.id).status).toBe(GenerationJobStatus.PENDING);
    });

    it('rejects an empty prompt', async () => {
      const { service } = await setup();

      await expect(validationErrors(service.create({ prompt: '' }))).resolves.toContain(
        'prompt: prompt should not be empty',
      );
    });

    it('reports nested parameter violations with their path', async () => {
      const { service } = await setup();

      const errors = await validationErrors(
        service.create({ prompt: 'a red fox', parameters: { width: 10, steps: 500 } }),
      );

      expect(errors).toEqual(
        expect.arrayContaining([
          'parameters.width: width must not be less than 64',
          'parameters.steps: steps must not be greater than 100',
        ]),
      );
    });

    it('rejects a malformed model name', async () => {
      const { service } = await setup();

      await expect(
        validationErrors(service.create({ prompt: 'a red fox', model: 'not a model!' })),
      ).resolves.toEqual([
        'model: model must be "stable-diffusion", "owner/name" or "owner/name:version"',
      ]);
    });

    it('rejects a model name without an owner', async () => {
      const { service, store } = await setup();

      await expect(
        validationErrors(service.create({ prompt: 'a red fox', model: 'sdxl' })),
      ).resolves.toEqual([
        'model: model must be "stable-diffusion", "owner/name" or "owner/name:version"',
      ]);
      await expect(store.list({ limit: 10, offset: 0 })).resolves.toHaveLength(0);
    });
  });

  describe('findById', () => {
    it('throws for an unknown job', async () => {
      const { service } = await setup();

      await expect(service.findById('missing-id')).rejects.toBeInstanceOf(JobNotFoundException);
    });
  });

  describe('list', () => {
    async function seeded() {
      const context = await setup();
      const { store } = context;
      store.seed({ id: 'oldest', createdAt: new Date('2026-01-01T00:00:00Z') });
      store.seed({
        id: 'middle',
        status: GenerationJobStatus.COMPLETED,
        createdAt: new Date('2026-01-02T00:00:00Z'),
      });
      store.seed({ id: 'newest', createdAt: new Date('2026-01-03T00:00:00Z') });
      return context;
    }

    it('returns the newest jobs first', async () => {
      const { service } = await seeded();

      const jobs = await service.list({});

      expect(jobs.map((job) => job.id)).toEqual(['newest', 'middle', 'oldest']);
    });

    it('filters by status and pages', async () => {
      const { service } = await seeded();

      await expect(service.list({ status: 'completed' })).resolves.toMatchObject([
        { id: 'middle' },
      ]);
      await expect(service.list({ limit: 1, offset: 1 })).resolves.toMatchObject([
        { id: 'middle' },
      ]);
    });

    it('rejects a limit above the maximum', async () => {
      const { service } = await seeded();

      await expect(validationErrors(service.list({ limit: 500 }))).resolves.toEqual([
        'limit: limit must not be greater than 100',
      ]);
    });
  });

  describe('cancel', () => {
    it('cancels a pending job and announces it', async () => {
      const { service, store, publisher } = await setup();
      const { id } = store.seed();

      const cancelled = await service.cancel(id);

      expect(cancelled.status).toBe(GenerationJobStatus.CANCELLED);
      expect(cancelled.completedAt).not.toBeNull();
      expect(store.get(id).status).toBe(GenerationJobStatus.CANCELLED);
      expect(publisher.publish).toHaveBeenCalledWith(
        `job:${id}:status`,
        expect.objectContaining({ jobId: id, status: 'cancelled' }),
      );
    });

    it('refuses to cancel a terminal job', async () => {
      const { service, store, publisher } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.COMPLETED });

      await expect(service.cancel(id)).rejects.toBeInstanceOf(InvalidTransitionException);
      expect(store.get(id).status).toBe(GenerationJobStatus.COMPLETED);
      expect(publisher.publish).not.toHaveBeenCalled();
    });

    it('retries when a concurrent write gets in first', async () => {
      const { service, store } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.PROCESSING });
      const update = jest
        .spyOn(store, 'update')
        .mockRejectedValueOnce(new StaleJobUpdateException(id, 1));

      await expect(service.cancel(id)).resolves.toMatchObject({
        status: GenerationJobStatus.CANCELLED,
      });
      expect(update).toHaveBeenCalledTimes(2);
    });

    it('gives up after three conflicting writes', async () => {
      const { service, store } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.PROCESSING });
      const update = jest
        .spyOn(store, 'update')
        .mockRejectedValue(new StaleJobUpdateException(id, 1));

      await expect(service.cancel(id)).rejects.toBeInstanceOf(StaleJobUpdateException);
      expect(update).toHaveBeenCalledTimes(3);
    });
  });

  describe('getMetadata', () => {
    it('returns the stored metadata record', async () => {
      const { service, store, artifacts } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.COMPLETED });
      await artifacts.putMetadata(id, { jobId: id, sizeBytes: 1024 });

      await expect(service.getMetadata(id)).resolves.toEqual({ jobId: id, sizeBytes: 1024 });
    });

    it('throws when no metadata was written', async () => {
      const { service, store } = await setup();
      const { id } = store.seed();

      await expect(service.getMetadata(id)).rejects.toBeInstanceOf(ArtifactNotFoundException);
    });
  });

  describe('getArtifact', () => {
    it('returns the bytes of a completed job', async () => {
      const { service, store, artifacts } = await setup();
      const { id } = store.seed({
        status: GenerationJobStatus.COMPLETED,
        resultPath: 'artifacts/done.jpg',
      });
      await artifacts.put(id, Buffer.from('jpeg bytes'), 'jpg');

      const artifact = await service.getArtifact(id);

      expect(artifact.path).toBe('artifacts/done.jpg');
      expect(artifact.bytes.toString()).toBe('jpeg bytes');
      expect(artifact.job.id).toBe(id);
    });

    it('refuses a job that has not completed', async () => {
      const { service, store } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.PROCESSING });

      await expect(service.getArtifact(id)).rejects.toBeInstanceOf(JobNotCompletedException);
    });

    it('reports a swept artifact as missing', async () => {
      const { service, store } = await setup();
      const { id } = store.seed({ status: GenerationJobStatus.COMPLETED, resultPath: null });

      await expect(service.getArtifact(id)).rejects.toThrow(
        `Artifact "artifacts/${id}" not found`,
      );
    });
  });
});
