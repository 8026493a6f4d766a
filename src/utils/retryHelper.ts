import { logger } from './logger';

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Delay before the first retry, doubled for each one after */
  baseDelay?: number;
  operationName?: string;
  /** Errors rejected here are rethrown without another attempt */
  shouldRetry?: (error: Error) => boolean;
}

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run an operation, retrying failures with exponential backoff
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    operationName = 'operation',
    shouldRetry = () => true,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || !shouldRetry(failure)) {
        logger.error(`${operationName} failed after ${attempt + 1} attempt(s)`, {
          error: failure.message,
        });
        throw failure;
      }

      const delay = baseDelay * 2 ** attempt;
      logger.warn(`${operationName} failed, retrying in ${delay}ms (retry ${attempt + 1}/${maxRetries})`, {
        error: failure.message,
      });
      await wait(delay);
    }
  }
}
