import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { JOB_STORE, JobStore } from '../jobs/job-store';
import { StaleJobUpdateException } from '../jobs/exceptions/job.exceptions';
import {
  ARTIFACT_STORE,
  ArtifactStore,
  extensionOf,
} from '../storage/artifact-store.interface';
import {
  RETENTION_SETTINGS,
  RetentionSettings,
} from '../config/worker-settings';
import { errorMessage } from '../common/exceptions/error-details';

/** Jobs examined per sweep; the rest wait for the next run */
export const SWEEP_BATCH_SIZE = 500;

export interface SweepReport {
  reclaimed: number;
  failed: number;
}

/**
 * RetentionSweeperService: deletes the artifacts of completed jobs past the
 * retention age and clears their result fields. The status stays Completed.
 *
 * A job whose artifact deletion fails keeps its result fields and is picked
 * up again by the next sweep.
 */
@Injectable()
export class RetentionSweeperService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(RetentionSweeperService.name);
  private timer: NodeJS.Timeout | null = null;

  constructor(
    @Inject(JOB_STORE)
    private readonly store: JobStore,

    @Inject(ARTIFACT_STORE)
    private readonly artifacts: ArtifactStore,

    @Inject(RETENTION_SETTINGS)
    private readonly settings: RetentionSettings,
  ) {}

  onApplicationBootstrap(): void {
    if (this.settings.sweepIntervalMs <= 0) {
      this.logger.log('Periodic retention sweep disabled');
      return;
    }

    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) =>
        this.logger.error(`Retention sweep failed: ${errorMessage(error)}`),
      );
    }, this.settings.sweepIntervalMs);
    this.logger.log(
      `Retention sweep every ${this.settings.sweepIntervalMs}ms for artifacts older than ${this.settings.maxAgeMs}ms`,
    );
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Sweeps jobs completed more than `olderThanMs` ago */
  async sweep(olderThanMs: number = this.settings.maxAgeMs): Promise<SweepReport> {
    const cutoff = new Date(Date.now() - olderThanMs);
    const jobs = await this.store.findSweepable(cutoff, SWEEP_BATCH_SIZE);
    const report: SweepReport = { reclaimed: 0, failed: 0 };

    for (const job of jobs) {
      if (!job.resultPath) {
        continue;
      }

      try {
        const existed = await this.artifacts.delete(job.id, extensionOf(job.resultPath));
        if (!existed) {
          this.logger.debug(`Artifact of job ${job.id} was already gone`);
        }

        await this.store.update(job, {
          resultPath: null,
          resultUrl: null,
          resultSizeBytes: null,
        });
        report.reclaimed++;
      } catch (error) {
        if (error instanceof StaleJobUpdateException) {
          this.logger.debug(`Job ${job.id} changed during sweep; left for next run`);
          continue;
        }
        report.failed++;
        this.logger.warn(
          `Could not reclaim artifact of job ${job.id}: ${errorMessage(error)}`,
        );
      }
    }

    if (jobs.length > 0) {
      this.logger.log(
        `Retention sweep: ${report.reclaimed} reclaimed, ${report.failed} failed (cutoff ${cutoff.toISOString()})`,
      );
    }
    return report;
  }
}
