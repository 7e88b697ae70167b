import { Injectable, Logger } from '@nestjs/common';
import { GenerationJob, GenerationJobStatus } from '@genforge/database';
import { RedisPublisherService } from '@genforge/redis';
import { JobStatusEvent } from './interfaces/job-status-event.interface';
import { errorMessage } from '../common/exceptions/error-details';

/**
 * Announces terminal job transitions. The database stays the source of
 * truth, so a failed publish is logged and otherwise ignored.
 */
@Injectable()
export class JobEventsPublisher {
  private readonly logger = new Logger(JobEventsPublisher.name);

  constructor(private readonly publisher: RedisPublisherService) {}

  static channel(jobId: string): string {
    return RedisPublisherService.channel('job', jobId, 'status');
  }

  async terminal(job: GenerationJob): Promise<void> {
    const status = eventStatus(job.status);
    if (status === null) {
      return;
    }

    const event: JobStatusEvent = {
      jobId: job.id,
      status,
      retryCount: job.retryCount,
      publishedAt: new Date().toISOString(),
    };
    if (status === 'failed' && job.errorMessage) {
      event.errorMessage = job.errorMessage;
    }
    if (status === 'completed' && job.resultUrl) {
      event.resultUrl = job.resultUrl;
    }

    try {
      await this.publisher.publish(JobEventsPublisher.channel(job.id), event);
    } catch (error) {
      this.logger.warn(
        `Could not publish ${status} event for job ${job.id}: ${errorMessage(error)}`,
      );
    }
  }
}

function eventStatus(status: GenerationJobStatus): JobStatusEvent['status'] | null {
  switch (status) {
    case GenerationJobStatus.COMPLETED:
      return 'completed';
    case GenerationJobStatus.FAILED:
      return 'failed';
    case GenerationJobStatus.CANCELLED:
      return 'cancelled';
    default:
      return null;
  }
}
