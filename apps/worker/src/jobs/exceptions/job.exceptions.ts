import { GenerationJobStatus } from '@genforge/database';

/**
 * Thrown when a status change is not an edge of the job state machine.
 * The record is left unchanged.
 */
export class InvalidTransitionException extends Error {
  constructor(
    public readonly from: GenerationJobStatus,
    public readonly to: GenerationJobStatus,
  ) {
    super(`Invalid job status transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionException';
  }
}

export class JobNotFoundException extends Error {
  constructor(public readonly jobId: string) {
    super(`Generation job ${jobId} not found`);
    this.name = 'JobNotFoundException';
  }
}

/**
 * Thrown when a conditional write finds the job at a different version than
 * the one it was read at: another writer changed it in between.
 */
export class StaleJobUpdateException extends Error {
  constructor(
    public readonly jobId: string,
    public readonly expectedVersion: number,
  ) {
    super(
      `Generation job ${jobId} was modified concurrently (expected version ${expectedVersion})`,
    );
    this.name = 'StaleJobUpdateException';
  }
}

/** Thrown when the artifact of a job that has not completed is requested */
export class JobNotCompletedException extends Error {
  constructor(
    public readonly jobId: string,
    public readonly status: GenerationJobStatus,
  ) {
    super(`Generation job ${jobId} is ${status}, not completed`);
    this.name = 'JobNotCompletedException';
  }
}

/** Thrown when a job request fails DTO validation; `errors` lists each violation */
export class JobValidationException extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid job request: ${errors.join('; ')}`);
    this.name = 'JobValidationException';
  }
}
