import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  DEFAULT_MODEL_ALIAS,
  GenerationClient,
  GenerationInput,
  PredictionState,
  PredictionStatus,
} from './generation-client.interface';
import {
  FatalException,
  TransientException,
} from '../common/exceptions/collaborator.exceptions';
import {
  errorMessage,
  isNetworkError,
} from '../common/exceptions/error-details';

export interface ReplicateClientOptions {
  apiToken: string;
  baseUrl: string;
  /** Used for the `stable-diffusion` alias */
  defaultModel: string;
  requestTimeoutMs: number;
}

// Input defaults tuned for flux-schnell
const DEFAULT_DIMENSION = 1024;
const DEFAULT_STEPS = 4;
const DEFAULT_GUIDANCE_SCALE = 3.5;

/** Longest response body excerpt kept in error messages */
const MAX_ERROR_DETAIL_LENGTH = 300;

const predictionSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  output: z.unknown().optional(),
  error: z.unknown().optional(),
});

type Prediction = z.infer<typeof predictionSchema>;

function statusFromReplicate(status: string): PredictionStatus {
  if (status === 'succeeded') return 'succeeded';
  if (status === 'failed' || status === 'canceled') return 'failed';
  return 'processing';
}

/** Replicate returns either a single URL or a list of them */
export function normalizeOutput(output: unknown): string[] {
  if (typeof output === 'string') {
    return output.length > 0 ? [output] : [];
  }
  if (Array.isArray(output)) {
    return output.filter(
      (item): item is string => typeof item === 'string' && item.length > 0,
    );
  }
  return [];
}

/**
 * ReplicateGenerationClient: GenerationClient over the Replicate REST API.
 *
 * Model references:
 *   "owner/name:version" → POST /predictions with { version }
 *   "owner/name"         → POST /models/owner/name/predictions
 *
 * HTTP 5xx, 429, network errors and timeouts are transient; any other
 * non-2xx response is fatal.
 */
export class ReplicateGenerationClient implements GenerationClient {
  private readonly logger = new Logger(ReplicateGenerationClient.name);

  constructor(private readonly options: ReplicateClientOptions) {}

  async submit(model: string, input: GenerationInput): Promise<string> {
    const reference = model === DEFAULT_MODEL_ALIAS ? this.options.defaultModel : model;
    const [name, version] = reference.split(':', 2);

    const url = version
      ? `${this.options.baseUrl}/predictions`
      : `${this.options.baseUrl}/models/${name}/predictions`;
    const body: Record<string, unknown> = { input: this.buildInput(input) };
    if (version) {
      body.version = version;
    }

    const response = await this.request(url, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
    });
    const prediction = await this.parsePrediction(response);

    this.logger.log(`Created prediction ${prediction.id} for model "${reference}"`);
    return prediction.id;
  }

  async poll(handle: string): Promise<PredictionState> {
    const response = await this.request(
      `${this.options.baseUrl}/predictions/${encodeURIComponent(handle)}`,
      { method: 'GET', headers: this.headers() },
    );
    const prediction = await this.parsePrediction(response);

    const state: PredictionState = {
      status: statusFromReplicate(prediction.status),
      output: normalizeOutput(prediction.output),
    };
    if (typeof prediction.error === 'string' && prediction.error.length > 0) {
      state.error = prediction.error;
    } else if (state.status === 'failed') {
      state.error = `prediction ${prediction.status}`;
    }

    this.logger.debug(`Prediction ${handle}: ${prediction.status}`);
    return state;
  }

  async fetch(url: string): Promise<Buffer> {
    const response = await this.request(url, { method: 'GET' });

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new TransientException(
        `Reading ${url} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  // ── Helpers ────────────────────────────────────────────────

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiToken}`,
      'Content-Type': 'application/json',
    };
  }

  private buildInput(input: GenerationInput): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      prompt: input.prompt,
      width: input.width ?? DEFAULT_DIMENSION,
      height: input.height ?? DEFAULT_DIMENSION,
      num_outputs: 1,
      num_inference_steps: input.steps ?? DEFAULT_STEPS,
      guidance_scale: input.guidanceScale ?? DEFAULT_GUIDANCE_SCALE,
    };
    if (input.seed !== undefined) {
      payload.seed = input.seed;
    }
    return payload;
  }

  /** Performs the request and classifies every failure */
  private async request(url: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      if (isNetworkError(error)) {
        throw new TransientException(
          `Request to ${url} failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      throw new FatalException(
        `Request to ${url} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (response.ok) {
      return response;
    }

    const details = await this.readErrorDetails(response);
    const message = `Request to ${url} failed with status ${response.status}${details ? `: ${details}` : ''}`;

    if (response.status >= 500 || response.status === 429) {
      throw new TransientException(message);
    }
    throw new FatalException(message);
  }

  private async readErrorDetails(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, MAX_ERROR_DETAIL_LENGTH);
    } catch (error) {
      this.logger.debug(`Error response body unreadable: ${errorMessage(error)}`);
      return '';
    }
  }

  private async parsePrediction(response: Response): Promise<Prediction> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransientException(
        `Unreadable prediction response: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const parsed = predictionSchema.safeParse(body);
    if (!parsed.success) {
      throw new FatalException(
        `Malformed prediction response: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      );
    }
    return parsed.data;
  }
}
