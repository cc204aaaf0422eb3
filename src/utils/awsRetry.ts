import { logger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 5,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

interface ErrorFields {
  name: string;
  message: string;
  code?: string;
  statusCode?: number;
}

// Errors from fs or the SDK may come from another realm, so no instanceof Error here
export function getErrorFields(error: unknown): ErrorFields {
  if (typeof error !== 'object' || error === null) {
    return { name: '', message: String(error) };
  }

  let statusCode: number | undefined;
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null
    && 'httpStatusCode' in error.$metadata && typeof error.$metadata.httpStatusCode === 'number') {
    statusCode = error.$metadata.httpStatusCode;
  } else if ('statusCode' in error && typeof error.statusCode === 'number') {
    statusCode = error.statusCode;
  }

  return {
    name: 'name' in error && typeof error.name === 'string' ? error.name : '',
    message: 'message' in error && typeof error.message === 'string' ? error.message : String(error),
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    statusCode,
  };
}

export function isThrottlingError(error: unknown): boolean {
  const { name, message, statusCode } = getErrorFields(error);

  return (
    name === 'ThrottlingException' ||
    name === 'TooManyRequestsException' ||
    name === 'RequestLimitExceeded' ||
    name === 'RateLimitExceededException' ||
    message.includes('Rate exceeded') ||
    message.includes('too many requests') ||
    statusCode === 429
  );
}

export function isRetryableError(error: unknown): boolean {
  // AWS SDK retryable errors
  const retryableCodes = [
    'ServiceUnavailable',
    'RequestTimeout',
    'RequestTimeoutException',
    'InternalServerError',
    'InternalError',
    'InternalFailureException',
  ];

  const { name, statusCode } = getErrorFields(error);

  return (
    isThrottlingError(error) ||
    retryableCodes.includes(name) ||
    statusCode === 500 ||
    statusCode === 502 ||
    statusCode === 503 ||
    statusCode === 504
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: RetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= opts.maxRetries) {
        throw error;
      }

      // Exponential backoff with jitter
      const baseDelay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffMultiplier, attempt),
        opts.maxDelay,
      );
      const jitter = Math.random() * 0.3 * baseDelay; // 30% jitter
      const delay = Math.floor(baseDelay + jitter);

      const { name, message } = getErrorFields(error);

      logger.warn(`${operationName} failed with ${name || 'error'}, retrying in ${delay}ms (attempt ${attempt + 1}/${opts.maxRetries})`, {
        error: message || 'Unknown error',
        attempt: attempt + 1,
        delay,
      });

      await sleep(delay);
    }
  }
}
