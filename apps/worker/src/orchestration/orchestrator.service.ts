import { Inject, Injectable, Logger } from '@nestjs/common';
import { GenerationJob, GenerationJobStatus } from '@genforge/database';
import { JOB_STORE, GenerationJobPatch, JobStore } from '../jobs/job-store';
import { JobEventsPublisher } from '../jobs/job-events.publisher';
import { assertTransition } from '../jobs/job-state-machine';
import {
  JobNotFoundException,
  StaleJobUpdateException,
} from '../jobs/exceptions/job.exceptions';
import {
  GENERATION_CLIENT,
  GenerationClient,
  GenerationInput,
} from '../generation/generation-client.interface';
import {
  ARTIFACT_STORE,
  ArtifactStore,
  extensionOf,
} from '../storage/artifact-store.interface';
import {
  ORCHESTRATION_SETTINGS,
  OrchestrationSettings,
} from '../config/worker-settings';
import {
  CallFailure,
  CallResult,
  attempt,
  describeFailure,
} from './call-result';
import { OrchestrationOutcome, terminalOutcome } from './orchestration-outcome';

/** Result of a conditional write: the updated job, or the terminal state that won the race */
type WriteResult =
  | { written: true; job: GenerationJob }
  | { written: false; outcome: OrchestrationOutcome };

const NUMERIC_PARAMETERS = ['width', 'height', 'steps', 'guidanceScale', 'seed'] as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Builds the generation request from the stored inputs.
 * Parameters live in a jsonb column, so their shape is checked here.
 */
export function buildGenerationInput(job: GenerationJob): CallResult<GenerationInput> {
  const input: GenerationInput = { prompt: job.prompt };

  for (const name of NUMERIC_PARAMETERS) {
    const value: unknown = job.parameters[name];
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return {
        ok: false,
        failure: {
          kind: 'fatal',
          stage: 'submission',
          message: `invalid parameter "${name}": ${JSON.stringify(value)}`,
        },
      };
    }
    input[name] = value;
  }

  return { ok: true, value: input };
}

/**
 * OrchestratorService: drives one generation job toward a terminal state.
 *
 * `advance()` performs one attempt and is safe to re-invoke after a crash at
 * any point: the external handle is checkpointed right after submission, so
 * a rerun resumes polling instead of submitting again, and every write is
 * conditional on the version the attempt read.
 *
 * Responsibilities:
 * 1. advance() : submit (once), poll with a bounded attempt count, store the
 *                 artifact and metadata, record the terminal state
 * 2. abandon() : force a non-terminal job to Failed once retries run out
 */
@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(GENERATION_CLIENT)
    private readonly client: GenerationClient,

    @Inject(ARTIFACT_STORE)
    private readonly artifacts: ArtifactStore,

    @Inject(ORCHESTRATION_SETTINGS)
    private readonly settings: OrchestrationSettings,

    private readonly events: JobEventsPublisher,
  ) {}

  // ── Public methods ──────────────────────────────────────

  /**
   * @throws JobNotFoundException when the id is unknown
   * @throws StaleJobUpdateException when another writer moved the job on and
   *         it is still not terminal
   */
  async advance(jobId: string): Promise<OrchestrationOutcome> {
    const loaded = await this.loadJob(jobId);
    const settled = terminalOutcome(loaded);
    if (settled) {
      this.logger.debug(`Job ${jobId} already ${loaded.status}; nothing to do`);
      return settled;
    }

    // ── Begin attempt ──
    if (loaded.status === GenerationJobStatus.PENDING) {
      assertTransition(loaded.status, GenerationJobStatus.PROCESSING);
    }
    const begun = await this.write(loaded, {
      status: GenerationJobStatus.PROCESSING,
      startedAt: loaded.startedAt ?? new Date(),
      retryCount: loaded.retryCount + 1,
    });
    if (!begun.written) {
      return begun.outcome;
    }
    let job = begun.job;

    this.logger.log(`Job ${jobId}: attempt ${job.retryCount} started`);

    // ── Submit once ──
    let handle = job.externalHandle;
    if (!handle) {
      const input = buildGenerationInput(job);
      if (!input.ok) {
        return this.handleFailure(job, input.failure);
      }

      const submitted = await attempt('submission', () =>
        this.client.submit(job.model, input.value),
      );
      if (!submitted.ok) {
        return this.handleFailure(job, submitted.failure);
      }

      const checkpoint = await this.write(job, { externalHandle: submitted.value });
      if (!checkpoint.written) {
        return checkpoint.outcome;
      }
      job = checkpoint.job;
      handle = submitted.value;
      this.logger.log(`Job ${jobId}: submitted as ${handle}`);
    } else {
      this.logger.log(`Job ${jobId}: resuming ${handle}`);
    }

    return this.pollUntilSettled(job, handle);
  }

  /**
   * Forces a non-terminal job to Failed with an `internal:` error.
   * A job that is already terminal is returned as it stands.
   */
  async abandon(jobId: string, reason: string): Promise<OrchestrationOutcome> {
    const job = await this.loadJob(jobId);
    const settled = terminalOutcome(job);
    if (settled) {
      return settled;
    }

    this.logger.warn(`Job ${jobId}: abandoning (${reason})`);
    return this.failJob(job, describeFailure({ stage: 'internal', message: reason }));
  }

  // ── Poll loop ───────────────────────────────────────────

  private async pollUntilSettled(
    job: GenerationJob,
    handle: string,
  ): Promise<OrchestrationOutcome> {
    const { maxPollAttempts, pollIntervalMs } = this.settings;

    for (let pollNumber = 1; pollNumber <= maxPollAttempts; pollNumber++) {
      if (pollNumber > 1) {
        await sleep(pollIntervalMs);

        const current = await this.loadJob(job.id);
        const settled = terminalOutcome(current);
        if (settled) {
          this.logger.log(`Job ${job.id}: became ${current.status} while polling`);
          return settled;
        }
      }

      const polled = await attempt('external generation', () =>
        this.client.poll(handle),
      );
      if (!polled.ok) {
        return this.handleFailure(job, polled.failure);
      }

      const state = polled.value;
      switch (state.status) {
        case 'succeeded': {
          const outputUrl = state.output?.[0];
          if (!outputUrl) {
            return this.failJob(
              job,
              describeFailure({
                stage: 'external generation',
                message: 'prediction succeeded with missing output',
              }),
            );
          }
          return this.materialize(job, handle, outputUrl);
        }
        case 'failed':
          return this.failJob(
            job,
            describeFailure({
              stage: 'external generation',
              message: state.error ?? 'prediction failed',
            }),
          );
        case 'processing':
          this.logger.debug(
            `Job ${job.id}: poll ${pollNumber}/${maxPollAttempts} still processing`,
          );
          break;
      }
    }

    return this.failJob(
      job,
      describeFailure({
        stage: 'timeout',
        message: `generation did not finish within ${maxPollAttempts} polls`,
      }),
    );
  }

  // ── Result materialization ──────────────────────────────

  private async materialize(
    job: GenerationJob,
    handle: string,
    outputUrl: string,
  ): Promise<OrchestrationOutcome> {
    const ext = extensionOf(outputUrl);

    const downloaded = await attempt('download', () => this.client.fetch(outputUrl));
    if (!downloaded.ok) {
      return this.handleFailure(job, downloaded.failure);
    }
    const bytes = downloaded.value;

    const stored = await attempt('storage', () =>
      this.artifacts.put(job.id, bytes, ext),
    );
    if (!stored.ok) {
      return this.handleFailure(job, stored.failure);
    }

    const completedAt = new Date();
    const metadata = await attempt('storage', () =>
      this.artifacts.putMetadata(job.id, {
        jobId: job.id,
        prompt: job.prompt,
        model: job.model,
        parameters: job.parameters,
        externalHandle: handle,
        sourceUrl: outputUrl,
        path: stored.value.path,
        url: stored.value.url,
        sizeBytes: bytes.length,
        format: ext,
        attempts: job.retryCount,
        createdAt: job.createdAt.toISOString(),
        completedAt: completedAt.toISOString(),
      }),
    );
    if (!metadata.ok) {
      return this.handleFailure(job, metadata.failure);
    }

    assertTransition(job.status, GenerationJobStatus.COMPLETED);
    const completed = await this.write(job, {
      status: GenerationJobStatus.COMPLETED,
      resultPath: stored.value.path,
      resultUrl: stored.value.url,
      resultSizeBytes: bytes.length,
      errorMessage: null,
      completedAt,
    });
    if (!completed.written) {
      await this.discardArtifact(job.id, ext);
      return completed.outcome;
    }

    this.logger.log(
      `Job ${job.id}: completed: ${stored.value.path} (${bytes.length} bytes)`,
    );
    await this.events.terminal(completed.job);
    return { status: 'completed' };
  }

  /** Removes an artifact stored by an attempt that lost the race to a terminal state */
  private async discardArtifact(jobId: string, ext: string): Promise<void> {
    const removed = await attempt('storage', () => this.artifacts.delete(jobId, ext));
    if (!removed.ok) {
      this.logger.warn(
        `Job ${jobId}: could not remove superseded artifact: ${removed.failure.message}`,
      );
    }
  }

  // ── Failure handling ────────────────────────────────────

  private async handleFailure(
    job: GenerationJob,
    failure: CallFailure,
  ): Promise<OrchestrationOutcome> {
    const description = describeFailure(failure);

    if (failure.kind === 'transient') {
      this.logger.warn(`Job ${job.id}: retryable failure: ${description}`);
      return { status: 'retryable', reason: description, retryCount: job.retryCount };
    }
    return this.failJob(job, description);
  }

  private async failJob(
    job: GenerationJob,
    message: string,
  ): Promise<OrchestrationOutcome> {
    assertTransition(job.status, GenerationJobStatus.FAILED);

    const failed = await this.write(job, {
      status: GenerationJobStatus.FAILED,
      errorMessage: message,
      resultPath: null,
      resultUrl: null,
      resultSizeBytes: null,
      completedAt: new Date(),
    });
    if (!failed.written) {
      return failed.outcome;
    }

    this.logger.error(`Job ${job.id}: failed: ${message}`);
    await this.events.terminal(failed.job);
    return { status: 'failed', error: message };
  }

  // ── Persistence helpers ─────────────────────────────────

  private async loadJob(jobId: string): Promise<GenerationJob> {
    const job = await this.store.findById(jobId);
    if (!job) {
      throw new JobNotFoundException(jobId);
    }
    return job;
  }

  /**
   * Conditional write. When it is rejected the job is re-read: a terminal
   * state reached meanwhile (typically a cancellation) becomes the outcome,
   * anything else is a genuine conflict and propagates.
   */
  private async write(
    job: GenerationJob,
    patch: GenerationJobPatch,
  ): Promise<WriteResult> {
    try {
      return { written: true, job: await this.store.update(job, patch) };
    } catch (error) {
      if (!(error instanceof StaleJobUpdateException)) {
        throw error;
      }

      const current = await this.loadJob(job.id);
      const settled = terminalOutcome(current);
      if (settled) {
        this.logger.log(
          `Job ${job.id}: became ${current.status} concurrently; dropping own update`,
        );
        return { written: false, outcome: settled };
      }
      throw error;
    }
  }
}
