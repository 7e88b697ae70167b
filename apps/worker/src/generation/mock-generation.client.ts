import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { PNG } from 'pngjs';
import {
  GenerationClient,
  GenerationInput,
  PredictionState,
} from './generation-client.interface';
import {
  FatalException,
  TransientException,
} from '../common/exceptions/collaborator.exceptions';

export interface MockClientOptions {
  delayMinMs: number;
  delayMaxMs: number;
  /** Probability in [0, 1] that a submit fails; polls fail at half this rate */
  failureRate: number;
  pollsToComplete: number;
  random?: () => number;
}

const MOCK_OUTPUT_BASE_URL = 'https://mock-generation.invalid/outputs';

const DEFAULT_SIZE = 512;
const MAX_SIZE = 2048;
const PLACEHOLDER_RGB = [100, 150, 200] as const;

/** `mock-{width}x{height}-{uuid}`: the handle carries everything fetch needs */
const HANDLE_PATTERN = /^mock-(\d+)x(\d+)-[\w-]+$/;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function clampSize(value: number | undefined): number {
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    return DEFAULT_SIZE;
  }
  return Math.min(value, MAX_SIZE);
}

/** Solid-colour PNG of the given size */
function renderPlaceholder(width: number, height: number): Buffer {
  const png = new PNG({ width, height });
  const [red, green, blue] = PLACEHOLDER_RGB;
  for (let offset = 0; offset < png.data.length; offset += 4) {
    png.data[offset] = red;
    png.data[offset + 1] = green;
    png.data[offset + 2] = blue;
    png.data[offset + 3] = 255;
  }
  return PNG.sync.write(png);
}

/**
 * MockGenerationClient: simulates the external service in-process for
 * local development, with random latency, random transient failures and a
 * prediction that succeeds after a fixed number of polls.
 *
 * Poll progress is kept per process. A handle this instance never issued
 * (after a restart, or from another worker) starts counting from zero.
 */
export class MockGenerationClient implements GenerationClient {
  private readonly logger = new Logger(MockGenerationClient.name);

  /** handle → polls answered so far, for predictions still running */
  private readonly predictions = new Map<string, number>();

  private readonly random: () => number;

  constructor(private readonly options: MockClientOptions) {
    this.random = options.random ?? Math.random;
  }

  async submit(model: string, input: GenerationInput): Promise<string> {
    await this.simulateLatency();

    if (this.random() < this.options.failureRate) {
      throw new TransientException(`Simulated API failure for model ${model}`);
    }

    const width = clampSize(input.width);
    const height = clampSize(input.height);
    const handle = `mock-${width}x${height}-${randomUUID()}`;
    this.predictions.set(handle, 0);
    this.logger.log(
      `Created mock prediction ${handle} (${input.prompt.length} char prompt)`,
    );
    return handle;
  }

  async poll(handle: string): Promise<PredictionState> {
    await this.simulateLatency();

    if (!HANDLE_PATTERN.test(handle)) {
      throw new FatalException(`Not a mock prediction: ${handle}`);
    }
    if (this.random() < this.options.failureRate / 2) {
      throw new TransientException(`Failed to fetch prediction ${handle}`);
    }

    const answered = (this.predictions.get(handle) ?? 0) + 1;
    if (answered < this.options.pollsToComplete) {
      this.predictions.set(handle, answered);
      return { status: 'processing' };
    }

    this.predictions.delete(handle);
    return {
      status: 'succeeded',
      output: [`${MOCK_OUTPUT_BASE_URL}/${handle}.png`],
    };
  }

  async fetch(url: string): Promise<Buffer> {
    await this.simulateLatency();

    if (!url.startsWith(`${MOCK_OUTPUT_BASE_URL}/`)) {
      throw new FatalException(`Not a mock output URL: ${url}`);
    }

    const name = url.slice(MOCK_OUTPUT_BASE_URL.length + 1).replace(/\.png$/, '');
    const size = HANDLE_PATTERN.exec(name);
    const width = clampSize(size ? Number(size[1]) : undefined);
    const height = clampSize(size ? Number(size[2]) : undefined);
    return renderPlaceholder(width, height);
  }

  private simulateLatency(): Promise<void> {
    const { delayMinMs, delayMaxMs } = this.options;
    return sleep(delayMinMs + this.random() * (delayMaxMs - delayMinMs));
  }
}
