/**
 * Failure classes raised by external collaborators (generation service,
 * object storage). The orchestrator's retry decision depends only on which
 * of the two a collaborator threw.
 */

/**
 * A failure expected to clear on its own: network errors, timeouts,
 * rate limiting, 5xx responses. The job stays resumable.
 */
export class TransientException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientException';
  }
}

/**
 * A failure that retrying cannot fix: rejected input, authentication,
 * protocol violations. The job is moved to Failed.
 */
export class FatalException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalException';
  }
}
