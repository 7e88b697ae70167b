import {
  GenerationJob,
  GenerationJobStatus,
  GenerationParameters,
} from '@genforge/database';

/** NestJS injection token for the JobStore implementation */
export const JOB_STORE = 'JOB_STORE';

export interface NewGenerationJob {
  prompt: string;
  model: string;
  parameters: GenerationParameters;
}

/** Mutable fields of a job; inputs, id and timestamps managed by the store are excluded */
export type GenerationJobPatch = Partial<
  Pick<
    GenerationJob,
    | 'status'
    | 'externalHandle'
    | 'retryCount'
    | 'errorMessage'
    | 'resultPath'
    | 'resultUrl'
    | 'resultSizeBytes'
    | 'startedAt'
    | 'completedAt'
  >
>;

export interface JobListFilter {
  status?: GenerationJobStatus;
  limit: number;
  offset: number;
}

/**
 * Durable job records.
 *
 * `update` is a conditional write: it applies only while the stored version
 * equals `job.version`, and returns the job as it now stands (version + 1).
 */
export interface JobStore {
  create(input: NewGenerationJob): Promise<GenerationJob>;

  findById(id: string): Promise<GenerationJob | null>;

  /** @throws StaleJobUpdateException when the stored version moved on */
  update(job: GenerationJob, patch: GenerationJobPatch): Promise<GenerationJob>;

  /** Newest first */
  list(filter: JobListFilter): Promise<GenerationJob[]>;

  /** Completed jobs finished before `cutoff` that still reference an artifact, oldest first */
  findSweepable(cutoff: Date, limit: number): Promise<GenerationJob[]>;

  /** Ids of every Pending or Processing job */
  findUnfinishedIds(): Promise<string[]>;
}
