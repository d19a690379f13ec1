/**
 * AWS SDK error inspection
 *
 * Reads the name, code and HTTP status of SDK errors without depending on a
 * particular service's exception classes.
 */

/**
 * AWS SDK error types that should be retried
 */
const RETRYABLE_ERROR_CODES = [
  'RequestTimeout',
  'RequestTimeoutException',
  'PriorRequestNotComplete',
  'ConnectionError',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'NetworkingError',
  'TimeoutError',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'SlowDown',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalError',
  'InternalServerError',
  'InternalServiceError',
];

export interface AwsErrorShape {
  name?: string;
  code?: string;
  message: string;
  statusCode?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract the fields we classify on from an unknown thrown value
 */
export function inspectAwsError(error: unknown): AwsErrorShape | null {
  if (!isRecord(error)) {
    return null;
  }

  const metadata = error.$metadata;
  const statusCode =
    isRecord(metadata) && typeof metadata.httpStatusCode === 'number'
      ? metadata.httpStatusCode
      : undefined;

  return {
    name: typeof error.name === 'string' ? error.name : undefined,
    code: typeof error.code === 'string' ? error.code : undefined,
    message: typeof error.message === 'string' ? error.message : '',
    statusCode,
  };
}

/**
 * True when the error carries one of the given names (or codes) or status codes
 */
export function hasAwsError(
  error: unknown,
  match: { names?: readonly string[]; statusCodes?: readonly number[] }
): boolean {
  const shape = inspectAwsError(error);
  if (!shape) return false;

  const names = match.names ?? [];
  if (shape.name && names.includes(shape.name)) return true;
  if (shape.code && names.includes(shape.code)) return true;

  return shape.statusCode !== undefined && (match.statusCodes ?? []).includes(shape.statusCode);
}

/**
 * Check if an error should be retried
 */
export function isRetryableError(error: unknown): boolean {
  const shape = inspectAwsError(error);
  if (!shape) return false;

  if (shape.name && RETRYABLE_ERROR_CODES.includes(shape.name)) {
    return true;
  }

  if (shape.code && RETRYABLE_ERROR_CODES.includes(shape.code)) {
    return true;
  }

  // Check error message for common retry patterns
  const message = shape.message.toLowerCase();
  if (
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('etimedout') ||
    message.includes('rate limit') ||
    message.includes('throttl') ||
    message.includes('too many requests')
  ) {
    return true;
  }

  // Retry on 429 (Too Many Requests), 500, 502, 503, 504
  if (shape.statusCode !== undefined) {
    return shape.statusCode === 429 || shape.statusCode >= 500;
  }

  return false;
}
