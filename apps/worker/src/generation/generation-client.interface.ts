/** NestJS injection token for the GenerationClient selected at startup */
export const GENERATION_CLIENT = 'GENERATION_CLIENT';

/** Model name accepted as an alias for the provider's default model */
export const DEFAULT_MODEL_ALIAS = 'stable-diffusion';

export interface GenerationInput {
  prompt: string;
  width?: number;
  height?: number;
  steps?: number;
  guidanceScale?: number;
  seed?: number;
}

export type PredictionStatus = 'succeeded' | 'failed' | 'processing';

export interface PredictionState {
  status: PredictionStatus;
  /** Output URLs; only meaningful once succeeded */
  output?: string[];
  error?: string;
}

/**
 * Client of the external asynchronous generation service.
 *
 * Every method rejects with TransientException or FatalException.
 */
export interface GenerationClient {
  /** @returns the external handle of the new prediction */
  submit(model: string, input: GenerationInput): Promise<string>;

  poll(handle: string): Promise<PredictionState>;

  fetch(url: string): Promise<Buffer>;
}
