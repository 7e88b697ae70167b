/**
 * JobStatusEvent: payload published to Redis PubSub on channel
 * `job:{jobId}:status` whenever a job reaches a terminal state.
 *
 * Invariants:
 *   - errorMessage is only set when status === 'failed'
 *   - resultUrl is only set when status === 'completed'
 *   - publishedAt is an ISO 8601 UTC string
 */
export interface JobStatusEvent {
  jobId: string;
  status: 'completed' | 'failed' | 'cancelled';
  retryCount: number;
  errorMessage?: string;
  resultUrl?: string;
  publishedAt: string;
}
