import { ConfigService } from '@nestjs/config';

// ── Injection tokens ────────────────────────────────────

export const ORCHESTRATION_SETTINGS = 'ORCHESTRATION_SETTINGS';
export const RETRY_SETTINGS = 'RETRY_SETTINGS';
export const DISPATCH_SETTINGS = 'DISPATCH_SETTINGS';
export const RETENTION_SETTINGS = 'RETENTION_SETTINGS';

/** Extra lease time on top of the longest possible invocation */
const LEASE_MARGIN_MS = 60_000;

/** Submit, final poll and download each get one request timeout */
const REQUESTS_OUTSIDE_POLL_LOOP = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

// ── Settings shapes ─────────────────────────────────────

export interface OrchestrationSettings {
  pollIntervalMs: number;
  maxPollAttempts: number;
}

export interface RetrySettings {
  baseDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  /** Jitter is drawn from [0, delay × jitterRatio) */
  jitterRatio: number;
  /** Retryable attempts allowed before the job is forced to Failed */
  maxRetries: number;
}

export interface DispatchSettings {
  pollIntervalMs: number;
  concurrency: number;
  leaseTtlMs: number;
  /** How often unfinished jobs missing from the queue are re-queued; 0 = bootstrap only */
  recoveryIntervalMs: number;
}

export interface RetentionSettings {
  maxAgeMs: number;
  /** 0 disables the periodic sweep */
  sweepIntervalMs: number;
}

// ── Factories ───────────────────────────────────────────

export function orchestrationSettingsFactory(
  configService: ConfigService,
): OrchestrationSettings {
  return {
    pollIntervalMs:
      configService.get<number>('GENERATION_POLL_INTERVAL_SEC', 10) * 1000,
    maxPollAttempts: configService.get<number>(
      'GENERATION_MAX_POLL_ATTEMPTS',
      30,
    ),
  };
}

export function retrySettingsFactory(
  configService: ConfigService,
): RetrySettings {
  return {
    baseDelayMs: configService.get<number>('RETRY_BASE_DELAY_SEC', 60) * 1000,
    backoffFactor: configService.get<number>('RETRY_BACKOFF_FACTOR', 2),
    maxDelayMs: configService.get<number>('RETRY_MAX_DELAY_SEC', 300) * 1000,
    jitterRatio: configService.get<number>('RETRY_JITTER_RATIO', 0.2),
    maxRetries: configService.get<number>('RETRY_MAX_ATTEMPTS', 3),
  };
}

export function dispatchSettingsFactory(
  configService: ConfigService,
): DispatchSettings {
  const explicitTtlSec = configService.get<number>('JOB_LEASE_TTL_SEC');

  return {
    pollIntervalMs: configService.get<number>('DISPATCH_POLL_INTERVAL_MS', 1000),
    concurrency: configService.get<number>('DISPATCH_CONCURRENCY', 4),
    recoveryIntervalMs:
      configService.get<number>('DISPATCH_RECOVERY_INTERVAL_SEC', 300) * 1000,
    leaseTtlMs:
      explicitTtlSec !== undefined
        ? explicitTtlSec * 1000
        : deriveLeaseTtlMs(
            orchestrationSettingsFactory(configService),
            configService.get<number>('GENERATION_REQUEST_TIMEOUT_SEC', 30) *
              1000,
          ),
  };
}

export function retentionSettingsFactory(
  configService: ConfigService,
): RetentionSettings {
  return {
    maxAgeMs: configService.get<number>('RETENTION_MAX_AGE_DAYS', 7) * DAY_MS,
    sweepIntervalMs:
      configService.get<number>('RETENTION_SWEEP_INTERVAL_SEC', 3600) * 1000,
  };
}

/**
 * Upper bound on one `advance` call: every poll may wait a full request
 * timeout plus the interval after it.
 */
export function deriveLeaseTtlMs(
  orchestration: OrchestrationSettings,
  requestTimeoutMs: number,
): number {
  const pollLoopMs =
    orchestration.maxPollAttempts *
    (orchestration.pollIntervalMs + requestTimeoutMs);
  return (
    pollLoopMs + REQUESTS_OUTSIDE_POLL_LOOP * requestTimeoutMs + LEASE_MARGIN_MS
  );
}
