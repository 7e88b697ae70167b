import { GenerationJobStatus } from '@genforge/database';
import { InvalidTransitionException } from './exceptions/job.exceptions';

/**
 * Allowed status edges. Completed, Failed and Cancelled have none, which is
 * what makes them terminal.
 */
const TRANSITIONS: Readonly<Record<GenerationJobStatus, readonly GenerationJobStatus[]>> = {
  [GenerationJobStatus.PENDING]: [
    GenerationJobStatus.PROCESSING,
    GenerationJobStatus.CANCELLED,
  ],
  [GenerationJobStatus.PROCESSING]: [
    GenerationJobStatus.COMPLETED,
    GenerationJobStatus.FAILED,
    GenerationJobStatus.CANCELLED,
  ],
  [GenerationJobStatus.COMPLETED]: [],
  [GenerationJobStatus.FAILED]: [],
  [GenerationJobStatus.CANCELLED]: [],
};

export function isTerminal(status: GenerationJobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(
  from: GenerationJobStatus,
  to: GenerationJobStatus,
): boolean {
  return TRANSITIONS[from].includes(to);
}

/** @throws InvalidTransitionException when `from → to` is not an edge */
export function assertTransition(
  from: GenerationJobStatus,
  to: GenerationJobStatus,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionException(from, to);
  }
}
