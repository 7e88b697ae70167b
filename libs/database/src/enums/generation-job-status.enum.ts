/**
 * Lifecycle status of a generation job.
 *
 * Transitions:
 *   PENDING → PROCESSING → COMPLETED
 *                        → FAILED
 *   PENDING | PROCESSING → CANCELLED
 *
 * COMPLETED, FAILED and CANCELLED are terminal.
 */
export enum GenerationJobStatus {
  /** Job created and waiting for its first orchestration attempt */
  PENDING = 'pending',

  /** At least one orchestration attempt has started */
  PROCESSING = 'processing',

  /** Artifact stored (see result_* columns) */
  COMPLETED = 'completed',

  /** Job failed (see errorMessage column for details) */
  FAILED = 'failed',

  /** Cancelled by request before reaching another terminal state */
  CANCELLED = 'cancelled',
}
