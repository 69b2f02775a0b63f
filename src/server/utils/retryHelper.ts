// ============================================
// Retry Helper
// Exponential backoff for outbound HTTP calls
// ============================================

import { AxiosError } from 'axios';
import { logger, errorMessage } from '../../shared/utils/logger';

export interface RetryOptions {
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each failure */
  initialDelayMs?: number;
  shouldRetry: (error: unknown) => boolean;
}

const MAX_DELAY_MS = 8000;

// Transport failures where the request never got an answer
const RETRYABLE_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK'
]);

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  operation: string,
  { maxAttempts, initialDelayMs = 500, shouldRetry }: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        logger.warn(`❌ ${operation} failed - not retryable`, { error: errorMessage(error), attempt });
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(`❌ ${operation} failed after all retries`, { error: errorMessage(error), attempts: attempt });
        throw error;
      }

      const delay = Math.min(initialDelayMs * 2 ** (attempt - 1), MAX_DELAY_MS);

      logger.warn(`⚠️ ${operation} failed, retrying...`, {
        error: errorMessage(error),
        attempt,
        nextAttempt: attempt + 1,
        delayMs: delay
      });

      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Server errors, rate limiting and transport failures; never other 4xx
 */
export function isRetryableRequestError(error: unknown): boolean {
  if (!(error instanceof AxiosError)) {
    return false;
  }

  const status = error.response?.status;
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }

  return error.code !== undefined && RETRYABLE_CODES.has(error.code);
}
