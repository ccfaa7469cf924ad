// Transport failures shared by the network-backed services.

/** Network error codes that warrant retry. */
export const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Code of a transport-level failure, looking through `cause` for errors
 * wrapped by fetch.
 */
export function networkErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      if (RETRYABLE_NETWORK_CODES.has(current.code)) return current.code;
    }
    current = current.cause;
  }
  return undefined;
}
