import { Logger } from '../logger';
import { RetryOptions, TransientNetworkError } from '../types';
import { classifyError } from './errors';

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run a registry call, retrying transient failures with exponential backoff.
 * Anything thrown is classified first; only TransientNetworkError is retried.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  logger: Logger,
  options: RetryOptions = {}
): Promise<T> {
  const retry = options.retry ?? 3;
  const throttle = options.throttle ?? 1000;

  for (let attempt = 0; ; attempt++) {
    if (attempt > 0) {
      const delay = throttle * 2 ** (attempt - 1);
      logger.debug(`Retrying ${operation} after ${delay}ms (attempt ${attempt + 1}/${retry + 1})`);
      await sleep(delay);
    }

    try {
      return await fn();
    } catch (error) {
      const classified = classifyError(error, operation);
      if (!(classified instanceof TransientNetworkError)) {
        throw classified;
      }
      if (attempt >= retry) {
        throw new TransientNetworkError(
          `${operation} failed after ${retry + 1} attempts: ${classified.message}`,
          classified.statusCode,
          classified.registryType
        );
      }
      logger.debug(`${operation} failed: ${classified.message}`);
    }
  }
}
