import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  VersionColumn,
  Index,
} from 'typeorm';
import { GenerationJobStatus } from '../enums/generation-job-status.enum';

/** Generation parameters accepted alongside the prompt */
export interface GenerationParameters {
  width?: number;
  height?: number;
  steps?: number;
  guidanceScale?: number;
  seed?: number;
}

/** Stored artifact reference of a completed job */
export interface GenerationJobResult {
  path: string;
  url: string;
  sizeBytes: number;
}

/**
 * GenerationJob entity: one request to generate an image via the external
 * generation service.
 *
 * Invariants:
 * - prompt, model and parameters never change after creation
 * - Terminal states: COMPLETED, FAILED, CANCELLED (no further status change)
 * - external_handle is written once, right after submission, and never cleared
 * - started_at is set on the first transition to PROCESSING
 * - completed_at is set on entering a terminal state
 * - error_message is set only on FAILED
 * - result_* columns are set only on COMPLETED; the retention sweep may clear
 *   them later while the status stays COMPLETED
 * - version is bumped by every UPDATE and guards conditional writes
 */
@Entity('generation_jobs')
@Index('IDX_generation_jobs_status_completed_at', ['status', 'completedAt'])
export class GenerationJob {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  prompt!: string;

  @Column({ type: 'varchar', length: 255, default: 'stable-diffusion' })
  model!: string;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  parameters!: GenerationParameters;

  @Index('IDX_generation_jobs_status')
  @Column({
    type: 'enum',
    enum: GenerationJobStatus,
    default: GenerationJobStatus.PENDING,
  })
  status!: GenerationJobStatus;

  @Column({
    type: 'varchar',
    length: 255,
    name: 'external_handle',
    nullable: true,
  })
  externalHandle!: string | null;

  @Column({ type: 'integer', name: 'retry_count', default: 0 })
  retryCount!: number;

  @Column({ type: 'text', name: 'error_message', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'varchar', length: 1024, name: 'result_path', nullable: true })
  resultPath!: string | null;

  @Column({ type: 'varchar', length: 1024, name: 'result_url', nullable: true })
  resultUrl!: string | null;

  @Column({ type: 'integer', name: 'result_size_bytes', nullable: true })
  resultSizeBytes!: number | null;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  @VersionColumn({ type: 'integer' })
  version!: number;
}

/**
 * Returns the stored artifact reference, or null when the job has none
 * (not completed yet, or already swept).
 */
export function jobResult(job: GenerationJob): GenerationJobResult | null {
  if (!job.resultPath || !job.resultUrl || job.resultSizeBytes === null) {
    return null;
  }
  return {
    path: job.resultPath,
    url: job.resultUrl,
    sizeBytes: job.resultSizeBytes,
  };
}
