import { GenerationJob, GenerationJobStatus } from '@genforge/database';
import { isTerminal } from '../jobs/job-state-machine';

export type OrchestrationOutcome =
  | { status: 'completed' }
  | { status: 'failed'; error: string }
  | { status: 'cancelled' }
  /** The job stays resumable; `retryCount` is the count after this attempt */
  | { status: 'retryable'; reason: string; retryCount: number };

/**
 * Outcome reported for a job already in a terminal state.
 *
 * @returns null while the job is still Pending or Processing
 */
export function terminalOutcome(job: GenerationJob): OrchestrationOutcome | null {
  if (!isTerminal(job.status)) {
    return null;
  }
  if (job.status === GenerationJobStatus.FAILED) {
    return { status: 'failed', error: job.errorMessage ?? 'unknown error' };
  }
  if (job.status === GenerationJobStatus.CANCELLED) {
    return { status: 'cancelled' };
  }
  return { status: 'completed' };
}
