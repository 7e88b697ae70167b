/** Socket and DNS error codes that indicate a network hiccup rather than a bad request */
const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The string `code` property that Node system errors and S3 errors carry */
export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * True for socket-level failures, including fetch's `TypeError: fetch failed`
 * whose cause carries the socket error, and for aborted or timed-out requests.
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }

  return error instanceof TypeError && error.message === 'fetch failed';
}
