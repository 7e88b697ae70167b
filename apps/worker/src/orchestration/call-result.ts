import { errorMessage } from '../common/exceptions/error-details';
import { ErrorClass, classifyError } from './retry-policy';

/** Where in the pipeline a failure happened; prefixes every recorded error */
export type FailureStage =
  | 'submission'
  | 'external generation'
  | 'download'
  | 'storage'
  | 'timeout'
  | 'internal';

export interface CallFailure {
  kind: ErrorClass;
  stage: FailureStage;
  message: string;
  cause?: unknown;
}

export type CallResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: CallFailure };

/**
 * Runs one collaborator call and converts a rejection into a classified
 * failure, so callers branch on the tag instead of catching.
 */
export async function attempt<T>(
  stage: FailureStage,
  call: () => Promise<T>,
): Promise<CallResult<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (error) {
    return {
      ok: false,
      failure: {
        kind: classifyError(error),
        stage,
        message: errorMessage(error),
        cause: error,
      },
    };
  }
}

export function describeFailure(failure: Pick<CallFailure, 'stage' | 'message'>): string {
  return `${failure.stage}: ${failure.message}`;
}
