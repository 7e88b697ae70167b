import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { GenerationJob } from '@genforge/database';
import { REDIS_KEY_PREFIX, RedisLeaseService } from '@genforge/redis';
import { JOB_STORE, JobStore } from '../jobs/job-store';
import { JobNotFoundException } from '../jobs/exceptions/job.exceptions';
import { RedisJobQueue } from '../queue/redis-job-queue';
import { OrchestratorService } from '../orchestration/orchestrator.service';
import {
  OrchestrationOutcome,
  terminalOutcome,
} from '../orchestration/orchestration-outcome';
import {
  computeBackoffDelay,
  hasExceededRetryCeiling,
} from '../orchestration/retry-policy';
import {
  DISPATCH_SETTINGS,
  DispatchSettings,
  RETRY_SETTINGS,
  RetrySettings,
} from '../config/worker-settings';
import { errorMessage } from '../common/exceptions/error-details';

/** How long shutdown waits for in-flight attempts before leaving them to lease expiry */
const SHUTDOWN_GRACE_MS = 10_000;

export type DispatchResult =
  /** Another invocation holds the job's lease */
  | { action: 'skipped' }
  /** The queued id has no job behind it */
  | { action: 'dropped' }
  | { action: 'settled'; outcome: OrchestrationOutcome }
  | { action: 'rescheduled'; delayMs: number }
  | { action: 'abandoned'; outcome: OrchestrationOutcome };

export function jobLeaseKey(jobId: string): string {
  return `${REDIS_KEY_PREFIX}:lease:job:${jobId}`;
}

/**
 * JobDispatcherService: the invoking layer around the orchestrator.
 *
 * Responsibilities:
 * 1. tick()          : claim due job ids, up to the free concurrency slots
 * 2. runJob()        : one single-flight `advance` under the job's lease, then
 *                       reschedule with backoff or abandon past the retry ceiling
 * 3. recoverOrphans(): re-queue Pending/Processing jobs missing from the queue
 *                       (at bootstrap and periodically)
 */
@Injectable()
export class JobDispatcherService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(JobDispatcherService.name);

  private readonly inFlight = new Set<Promise<void>>();
  private pollTimer: NodeJS.Timeout | null = null;
  private recoveryTimer: NodeJS.Timeout | null = null;
  private ticking = false;
  private stopping = false;

  constructor(
    private readonly orchestrator: OrchestratorService,
    private readonly queue: RedisJobQueue,
    private readonly leases: RedisLeaseService,

    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(DISPATCH_SETTINGS)
    private readonly dispatch: DispatchSettings,

    @Inject(RETRY_SETTINGS)
    private readonly retry: RetrySettings,
  ) {}

  // ── Lifecycle ───────────────────────────────────────────

  async onApplicationBootstrap(): Promise<void> {
    await this.runRecovery();

    this.pollTimer = setInterval(() => {
      this.tick().catch((error: unknown) =>
        this.logger.error(`Dispatch tick failed: ${errorMessage(error)}`),
      );
    }, this.dispatch.pollIntervalMs);

    if (this.dispatch.recoveryIntervalMs > 0) {
      this.recoveryTimer = setInterval(() => {
        this.runRecovery().catch((error: unknown) =>
          this.logger.error(`Recovery pass failed: ${errorMessage(error)}`),
        );
      }, this.dispatch.recoveryIntervalMs);
    }

    this.logger.log(
      `Dispatcher started: every ${this.dispatch.pollIntervalMs}ms, ` +
        `concurrency ${this.dispatch.concurrency}, lease ${this.dispatch.leaseTtlMs}ms`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    this.stopping = true;
    if (this.pollTimer) clearInterval(this.pollTimer);
    if (this.recoveryTimer) clearInterval(this.recoveryTimer);

    if (this.inFlight.size === 0) {
      return;
    }

    this.logger.log(`Waiting for ${this.inFlight.size} in-flight job(s)`);
    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      graceTimer = setTimeout(resolve, SHUTDOWN_GRACE_MS);
    });
    await Promise.race([Promise.allSettled([...this.inFlight]), grace]);
    clearTimeout(graceTimer);
  }

  // ── Dispatch loop ───────────────────────────────────────

  /** Claims due ids into the free slots; returns the ids started */
  async tick(): Promise<string[]> {
    if (this.ticking || this.stopping) {
      return [];
    }
    this.ticking = true;

    try {
      const capacity = this.dispatch.concurrency - this.inFlight.size;
      if (capacity <= 0) {
        return [];
      }

      const jobIds = await this.queue.claimDue(capacity);
      for (const jobId of jobIds) {
        this.track(jobId);
      }
      return jobIds;
    } finally {
      this.ticking = false;
    }
  }

  /** Number of attempts currently running in this process */
  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * One invocation of the orchestrator for `jobId`, single-flight across
   * processes through the job lease.
   */
  async runJob(jobId: string): Promise<DispatchResult> {
    const lease = await this.leases.acquire(
      jobLeaseKey(jobId),
      this.dispatch.leaseTtlMs,
    );
    if (!lease) {
      this.logger.debug(`Job ${jobId} is leased elsewhere; skipping`);
      return { action: 'skipped' };
    }

    try {
      return await this.advanceUnderLease(jobId);
    } finally {
      await lease.release().catch((error: unknown) =>
        this.logger.warn(
          `Could not release lease of job ${jobId}: ${errorMessage(error)}`,
        ),
      );
    }
  }

  /**
   * Queues every Pending or Processing job that is not queued yet.
   *
   * @returns how many ids were added
   */
  async recoverOrphans(): Promise<number> {
    const jobIds = await this.store.findUnfinishedIds();

    let requeued = 0;
    for (const jobId of jobIds) {
      if (await this.queue.scheduleIfAbsent(jobId)) {
        requeued++;
      }
    }

    if (requeued > 0) {
      this.logger.log(
        `Recovered ${requeued} of ${jobIds.length} unfinished job(s) into the queue`,
      );
    }
    return requeued;
  }

  // ── Helpers ────────────────────────────────────────────────

  private track(jobId: string): void {
    const run: Promise<void> = this.runJob(jobId)
      .then((result) => {
        this.logger.debug(`Job ${jobId}: ${result.action}`);
      })
      .catch((error: unknown) => {
        this.logger.error(`Dispatch of job ${jobId} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  private async advanceUnderLease(jobId: string): Promise<DispatchResult> {
    let outcome: OrchestrationOutcome;
    try {
      outcome = await this.orchestrator.advance(jobId);
    } catch (error) {
      if (error instanceof JobNotFoundException) {
        this.logger.warn(`Queued job ${jobId} does not exist; dropping it`);
        return { action: 'dropped' };
      }

      return this.afterAbortedAttempt(jobId, error);
    }

    if (outcome.status !== 'retryable') {
      return { action: 'settled', outcome };
    }

    if (hasExceededRetryCeiling(outcome, this.retry)) {
      const final = await this.orchestrator.abandon(jobId, 'max retries exceeded');
      return { action: 'abandoned', outcome: final };
    }

    this.logger.warn(
      `Job ${jobId}: retry ${outcome.retryCount} of ${this.retry.maxRetries} (${outcome.reason})`,
    );
    return this.reschedule(jobId, outcome.retryCount);
  }

  /**
   * `advance` threw, typically because a write failed. The job is re-read so
   * the retry ceiling and backoff still apply; when it cannot be read the
   * attempt is retried after the base delay.
   */
  private async afterAbortedAttempt(
    jobId: string,
    error: unknown,
  ): Promise<DispatchResult> {
    this.logger.error(`Job ${jobId}: attempt aborted (${errorMessage(error)})`);

    let job: GenerationJob | null = null;
    try {
      job = await this.store.findById(jobId);
    } catch (readError) {
      this.logger.warn(
        `Job ${jobId}: could not re-read after aborted attempt: ${errorMessage(readError)}`,
      );
    }
    if (!job) {
      return this.reschedule(jobId, 0);
    }

    const settled = terminalOutcome(job);
    if (settled) {
      return { action: 'settled', outcome: settled };
    }

    if (hasExceededRetryCeiling(job, this.retry)) {
      try {
        const final = await this.orchestrator.abandon(jobId, 'max retries exceeded');
        return { action: 'abandoned', outcome: final };
      } catch (abandonError) {
        this.logger.warn(
          `Job ${jobId}: could not abandon: ${errorMessage(abandonError)}`,
        );
      }
    }

    return this.reschedule(jobId, job.retryCount);
  }

  /** Queues the job again after the backoff for its `retryCount`-th attempt */
  private async reschedule(
    jobId: string,
    retryCount: number,
  ): Promise<DispatchResult> {
    const delayMs = computeBackoffDelay(retryCount - 1, this.retry);
    this.logger.debug(`Job ${jobId}: next attempt in ${delayMs}ms`);
    await this.queue.schedule(jobId, delayMs);
    return { action: 'rescheduled', delayMs };
  }

  private async runRecovery(): Promise<void> {
    try {
      await this.recoverOrphans();
    } catch (error) {
      this.logger.error(`Orphan recovery failed: ${errorMessage(error)}`);
    }
  }
}
