import { GenerationJob } from '@genforge/database';
import { RetrySettings } from '../config/worker-settings';
import {
  FatalException,
  TransientException,
} from '../common/exceptions/collaborator.exceptions';
import { isNetworkError } from '../common/exceptions/error-details';

export type ErrorClass = 'transient' | 'fatal';

/**
 * Transient errors leave the job resumable; everything else, including
 * errors nobody anticipated, is fatal.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof TransientException) {
    return 'transient';
  }
  if (error instanceof FatalException) {
    return 'fatal';
  }
  return isNetworkError(error) ? 'transient' : 'fatal';
}

/**
 * Delay before re-invoking a job after its `attempt`-th retryable outcome
 * (0-based): `min(base × factor^attempt, max)` plus jitter drawn from
 * `[0, delay × jitterRatio)`.
 */
export function computeBackoffDelay(
  attempt: number,
  settings: RetrySettings,
  random: () => number = Math.random,
): number {
  const exponential =
    settings.baseDelayMs * Math.pow(settings.backoffFactor, Math.max(0, attempt));
  const delay = Math.min(exponential, settings.maxDelayMs);
  const jitter = delay * settings.jitterRatio * random();
  return Math.floor(delay + jitter);
}

export function hasExceededRetryCeiling(
  job: Pick<GenerationJob, 'retryCount'>,
  settings: RetrySettings,
): boolean {
  return job.retryCount > settings.maxRetries;
}
