import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  GenerationJob,
  GenerationJobStatus,
  GenerationParameters,
} from '@genforge/database';
import { JOB_STORE, JobStore } from './job-store';
import { JobEventsPublisher } from './job-events.publisher';
import { assertTransition } from './job-state-machine';
import {
  JobNotCompletedException,
  JobNotFoundException,
  StaleJobUpdateException,
} from './exceptions/job.exceptions';
import { CreateGenerationJobDto } from './dto/create-generation-job.dto';
import {
  DEFAULT_LIST_LIMIT,
  ListGenerationJobsDto,
} from './dto/list-generation-jobs.dto';
import { validateDto } from './dto/validate-dto';
import { RedisJobQueue } from '../queue/redis-job-queue';
import {
  ARTIFACT_STORE,
  ArtifactMetadata,
  ArtifactStore,
  extensionOf,
} from '../storage/artifact-store.interface';
import { ArtifactNotFoundException } from '../storage/exceptions/storage.exceptions';
import { DEFAULT_MODEL_ALIAS } from '../generation/generation-client.interface';
import { errorMessage } from '../common/exceptions/error-details';

/** Conditional-write attempts before a cancellation gives up on a busy job */
const MAX_CANCEL_ATTEMPTS = 3;

export interface JobArtifact {
  job: GenerationJob;
  path: string;
  bytes: Buffer;
}

/**
 * JobsService: the job lifecycle operations exposed to callers.
 *
 * Creation persists a Pending job and queues it; everything after that is
 * driven by the dispatcher. Cancellation is the only state change made here.
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(ARTIFACT_STORE)
    private readonly artifacts: ArtifactStore,

    private readonly queue: RedisJobQueue,
    private readonly events: JobEventsPublisher,
  ) {}

  /**
   * Validates the request, stores a Pending job and queues it for immediate
   * processing. A job whose queueing fails is still returned: the
   * dispatcher's recovery pass queues every unfinished job it finds.
   *
   * @throws JobValidationException
   */
  async create(request: object): Promise<GenerationJob> {
    const dto = await validateDto(CreateGenerationJobDto, request);

    const job = await this.store.create({
      prompt: dto.prompt,
      model: dto.model || DEFAULT_MODEL_ALIAS,
      parameters: toParameters(dto),
    });
    this.logger.log(`Created generation job ${job.id} (model "${job.model}")`);

    try {
      await this.queue.schedule(job.id);
    } catch (error) {
      this.logger.error(
        `Job ${job.id} saved but not queued; left to recovery: ${errorMessage(error)}`,
      );
    }
    return job;
  }

  /** @throws JobNotFoundException */
  async findById(jobId: string): Promise<GenerationJob> {
    const job = await this.store.findById(jobId);
    if (!job) {
      throw new JobNotFoundException(jobId);
    }
    return job;
  }

  /**
   * Newest first; limit defaults to 50 and is capped at 100.
   *
   * @throws JobValidationException
   */
  async list(query: object): Promise<GenerationJob[]> {
    const dto = await validateDto(ListGenerationJobsDto, query);
    return this.store.list({
      status: dto.status,
      limit: dto.limit ?? DEFAULT_LIST_LIMIT,
      offset: dto.offset ?? 0,
    });
  }

  /**
   * Moves a Pending or Processing job to Cancelled. An in-flight attempt
   * notices before its next poll or when its next write is rejected.
   *
   * @throws JobNotFoundException
   * @throws InvalidTransitionException when the job is already terminal
   */
  cancel(jobId: string): Promise<GenerationJob> {
    return this.tryCancel(jobId, MAX_CANCEL_ATTEMPTS);
  }

  /**
   * @throws JobNotFoundException
   * @throws ArtifactNotFoundException when no metadata was stored
   */
  async getMetadata(jobId: string): Promise<ArtifactMetadata> {
    await this.findById(jobId);
    return this.artifacts.getMetadata(jobId);
  }

  /**
   * @throws JobNotFoundException
   * @throws JobNotCompletedException
   * @throws ArtifactNotFoundException when the artifact was already swept
   */
  async getArtifact(jobId: string): Promise<JobArtifact> {
    const job = await this.findById(jobId);
    if (job.status !== GenerationJobStatus.COMPLETED) {
      throw new JobNotCompletedException(jobId, job.status);
    }
    if (!job.resultPath) {
      throw new ArtifactNotFoundException(`artifacts/${jobId}`);
    }

    const bytes = await this.artifacts.get(jobId, extensionOf(job.resultPath));
    return { job, path: job.resultPath, bytes };
  }

  // ── Helpers ────────────────────────────────────────────────

  private async tryCancel(
    jobId: string,
    attemptsLeft: number,
  ): Promise<GenerationJob> {
    const job = await this.findById(jobId);
    assertTransition(job.status, GenerationJobStatus.CANCELLED);

    let cancelled: GenerationJob;
    try {
      cancelled = await this.store.update(job, {
        status: GenerationJobStatus.CANCELLED,
        completedAt: new Date(),
      });
    } catch (error) {
      if (error instanceof StaleJobUpdateException && attemptsLeft > 1) {
        this.logger.debug(`Cancel of job ${jobId} raced another write; retrying`);
        return this.tryCancel(jobId, attemptsLeft - 1);
      }
      throw error;
    }

    this.logger.log(`Cancelled generation job ${jobId} (was ${job.status})`);
    await this.events.terminal(cancelled);
    return cancelled;
  }
}

function toParameters(dto: CreateGenerationJobDto): GenerationParameters {
  const parameters: GenerationParameters = {};
  const source = dto.parameters;
  if (!source) {
    return parameters;
  }

  if (source.width !== undefined) parameters.width = source.width;
  if (source.height !== undefined) parameters.height = source.height;
  if (source.steps !== undefined) parameters.steps = source.steps;
  if (source.guidanceScale !== undefined) parameters.guidanceScale = source.guidanceScale;
  if (source.seed !== undefined) parameters.seed = source.seed;
  return parameters;
}
