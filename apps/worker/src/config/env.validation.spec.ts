import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('fills in defaults for an empty environment', () => {
    const env = validateEnv({});

    expect(env.WORKER_GRPC_PORT).toBe(50051);
    expect(env.GENERATION_PROVIDER).toBe('mock');
    expect(env.MINIO_USE_SSL).toBe(false);
    expect(env.MINIO_BUCKET).toBe('genforge-media');
    expect(env.RETRY_MAX_ATTEMPTS).toBe(3);
    expect(env.JOB_LEASE_TTL_SEC).toBeUndefined();
  });

  it('coerces string values', () => {
    const env = validateEnv({
      WORKER_GRPC_PORT: '6000',
      MINIO_USE_SSL: 'true',
      RETRY_JITTER_RATIO: '0.5',
      STORAGE_PUBLIC_BASE_URL: 'https://cdn.test/media/',
    });

    expect(env.WORKER_GRPC_PORT).toBe(6000);
    expect(env.MINIO_USE_SSL).toBe(true);
    expect(env.RETRY_JITTER_RATIO).toBe(0.5);
    expect(env.STORAGE_PUBLIC_BASE_URL).toBe('https://cdn.test/media');
  });

  it('requires an API token for the replicate provider', () => {
    expect(() => validateEnv({ GENERATION_PROVIDER: 'replicate' })).toThrow(
      'REPLICATE_API_TOKEN: REPLICATE_API_TOKEN is required when GENERATION_PROVIDER is replicate',
    );
    expect(
      validateEnv({ GENERATION_PROVIDER: 'replicate', REPLICATE_API_TOKEN: 'test-secret' })
        .REPLICATE_API_TOKEN,
    ).toBe('test-secret');
  });

  it('reports every offending variable', () => {
    const run = () =>
      validateEnv({ DISPATCH_CONCURRENCY: '0', MOCK_FAILURE_RATE: '1.5', REDIS_PORT: 'abc' });

    expect(run).toThrow('Invalid environment configuration: ');
    expect(run).toThrow('DISPATCH_CONCURRENCY: DISPATCH_CONCURRENCY must be greater than 0');
    expect(run).toThrow('MOCK_FAILURE_RATE: MOCK_FAILURE_RATE must be between 0 and 1');
    expect(run).toThrow('REDIS_PORT: REDIS_PORT must be a number');
  });

  it('rejects inverted ranges', () => {
    expect(() => validateEnv({ RETRY_BASE_DELAY_SEC: '600', RETRY_MAX_DELAY_SEC: '60' })).toThrow(
      'RETRY_BASE_DELAY_SEC cannot exceed RETRY_MAX_DELAY_SEC',
    );
    expect(() => validateEnv({ MOCK_DELAY_MIN_MS: '500', MOCK_DELAY_MAX_MS: '100' })).toThrow(
      'MOCK_DELAY_MIN_MS cannot exceed MOCK_DELAY_MAX_MS',
    );
  });
});
