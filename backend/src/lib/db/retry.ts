import { logger } from '../../logger';
import { TransientConflictError } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  shouldRetry?: (error: unknown) => boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 25,
  maxDelay: 500,
};

function isRetryableConflict(error: unknown): boolean {
  return error instanceof TransientConflictError;
}

export function calculateDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);
  const jitter = 1 + Math.random() * 0.3;
  return Math.round(cappedDelay * jitter);
}

/**
 * Re-run a critical section that lost a lock race. Only TransientConflictError
 * is retried unless `shouldRetry` says otherwise; the last conflict is rethrown
 * once retries run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  const { maxRetries, baseDelay, maxDelay } = config;
  const shouldRetry = config.shouldRetry ?? isRetryableConflict;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelay, maxDelay);
      logger.warn(
        { attempt: attempt + 1, maxRetries, delay, error: error instanceof Error ? error.message : String(error) },
        'Retrying ledger operation after conflict'
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  logger.error(
    { attempts: maxRetries + 1, error: lastError instanceof Error ? lastError.message : String(lastError) },
    'Ledger operation failed after all retries'
  );
  throw lastError;
}
