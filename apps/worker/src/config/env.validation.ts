import { z } from 'zod';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const positiveNumber = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .positive(`${name} must be greater than 0`);

const positiveInt = (name: string) => positiveNumber(name).int(`${name} must be an integer`);

const ratio = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .min(0, `${name} must be between 0 and 1`)
    .max(1, `${name} must be between 0 and 1`);

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // ── Transport ─────────────────────────────────────────
    WORKER_GRPC_HOST: z.string().min(1).default('0.0.0.0'),
    WORKER_GRPC_PORT: positiveInt('WORKER_GRPC_PORT').default(50051),
    WORKER_HTTP_PORT: positiveInt('WORKER_HTTP_PORT').default(50052),

    // ── Database ──────────────────────────────────────────
    POSTGRES_HOST: z.string().min(1).default('localhost'),
    POSTGRES_PORT: positiveInt('POSTGRES_PORT').default(5432),
    POSTGRES_USER: z.string().min(1).default('genforge'),
    POSTGRES_PASSWORD: z.string().min(1).default('genforge_secret'),
    POSTGRES_DB: z.string().min(1).default('genforge'),

    // ── Redis ─────────────────────────────────────────────
    REDIS_HOST: z.string().min(1).default('localhost'),
    REDIS_PORT: positiveInt('REDIS_PORT').default(6379),
    REDIS_DB: z.coerce.number().int().min(0).default(0),

    // ── Object storage ────────────────────────────────────
    MINIO_ENDPOINT: z.string().min(1).default('localhost'),
    MINIO_PORT: positiveInt('MINIO_PORT').default(9000),
    MINIO_USE_SSL: booleanString,
    MINIO_ACCESS_KEY: z.string().min(1).default('minioadmin'),
    MINIO_SECRET_KEY: z.string().min(1).default('minioadmin_secret'),
    MINIO_BUCKET: z.string().min(3).default('genforge-media'),
    STORAGE_PUBLIC_BASE_URL: z
      .string()
      .url({ message: 'STORAGE_PUBLIC_BASE_URL must be a valid URL' })
      .transform((value) => value.replace(/\/$/, ''))
      .default('http://localhost:9000/genforge-media'),

    // ── Generation provider ───────────────────────────────
    GENERATION_PROVIDER: z.enum(['replicate', 'mock']).default('mock'),
    GENERATION_POLL_INTERVAL_SEC: positiveNumber('GENERATION_POLL_INTERVAL_SEC').default(10),
    GENERATION_MAX_POLL_ATTEMPTS: positiveInt('GENERATION_MAX_POLL_ATTEMPTS').default(30),
    GENERATION_REQUEST_TIMEOUT_SEC: positiveNumber('GENERATION_REQUEST_TIMEOUT_SEC').default(30),
    REPLICATE_API_TOKEN: z.string().optional(),
    REPLICATE_API_BASE_URL: z
      .string()
      .url()
      .transform((value) => value.replace(/\/$/, ''))
      .default('https://api.replicate.com/v1'),
    REPLICATE_DEFAULT_MODEL: z.string().min(1).default('black-forest-labs/flux-schnell'),
    MOCK_DELAY_MIN_MS: z.coerce.number().int().min(0).default(200),
    MOCK_DELAY_MAX_MS: z.coerce.number().int().min(0).default(1000),
    MOCK_FAILURE_RATE: ratio('MOCK_FAILURE_RATE').default(0.1),
    MOCK_POLLS_TO_COMPLETE: positiveInt('MOCK_POLLS_TO_COMPLETE').default(2),

    // ── Retry / backoff ───────────────────────────────────
    RETRY_BASE_DELAY_SEC: positiveNumber('RETRY_BASE_DELAY_SEC').default(60),
    RETRY_BACKOFF_FACTOR: z.coerce.number().min(1, 'RETRY_BACKOFF_FACTOR must be at least 1').default(2),
    RETRY_MAX_DELAY_SEC: positiveNumber('RETRY_MAX_DELAY_SEC').default(300),
    RETRY_JITTER_RATIO: ratio('RETRY_JITTER_RATIO').default(0.2),
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(3),

    // ── Dispatch ──────────────────────────────────────────
    DISPATCH_POLL_INTERVAL_MS: positiveInt('DISPATCH_POLL_INTERVAL_MS').default(1000),
    DISPATCH_CONCURRENCY: positiveInt('DISPATCH_CONCURRENCY').default(4),
    DISPATCH_RECOVERY_INTERVAL_SEC: z.coerce.number().min(0).default(300),
    JOB_LEASE_TTL_SEC: positiveNumber('JOB_LEASE_TTL_SEC').optional(),

    // ── Retention ─────────────────────────────────────────
    RETENTION_MAX_AGE_DAYS: positiveNumber('RETENTION_MAX_AGE_DAYS').default(7),
    RETENTION_SWEEP_INTERVAL_SEC: z.coerce.number().min(0).default(3600),
  })
  .superRefine((data, ctx) => {
    if (data.GENERATION_PROVIDER === 'replicate' && !data.REPLICATE_API_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'REPLICATE_API_TOKEN is required when GENERATION_PROVIDER is replicate',
        path: ['REPLICATE_API_TOKEN'],
      });
    }

    if (data.MOCK_DELAY_MIN_MS > data.MOCK_DELAY_MAX_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'MOCK_DELAY_MIN_MS cannot exceed MOCK_DELAY_MAX_MS',
        path: ['MOCK_DELAY_MIN_MS'],
      });
    }

    if (data.RETRY_BASE_DELAY_SEC > data.RETRY_MAX_DELAY_SEC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'RETRY_BASE_DELAY_SEC cannot exceed RETRY_MAX_DELAY_SEC',
        path: ['RETRY_BASE_DELAY_SEC'],
      });
    }
  });

export type WorkerEnv = z.infer<typeof envSchema>;

/**
 * `validate` hook for ConfigModule.forRoot: coerces and defaults every
 * variable, or throws listing all offending keys.
 */
export function validateEnv(config: Record<string, unknown>): WorkerEnv {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
}
