/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient failures of the retrieval API: HTTP 429, 5xx and network errors.
 */

import { isAxiosError } from 'axios';
import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Waits between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_CONFIG = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED', 'EAI_AGAIN']);

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Default retryable error detection
 */
export function isRetryableError(error: unknown): boolean {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return status === 429 || (status >= 500 && status < 600);
    }
    // No response at all: the request never completed
    return true;
  }

  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.has(code)) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry-After header value in milliseconds, or null if not present
 */
function getRetryAfterDelay(error: unknown): number | null {
  if (!isAxiosError(error)) {
    return null;
  }
  const header: unknown = error.response?.headers?.['retry-after'];
  if (typeof header !== 'string' && typeof header !== 'number') {
    return null;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., the query window)
 * @throws The last error if all retries are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryableError,
    sleep = defaultSleep,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info({ attempt: attempt + 1, context }, `Operation succeeded after ${attempt} retry attempts${contextStr}`);
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          { attempt: attempt + 1, error: describeError(error), context },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.error(
          { attempt: attempt + 1, error: describeError(error), context },
          `Operation failed after ${maxRetries + 1} attempts${contextStr}`
        );
        throw error;
      }

      const retryAfterDelay = getRetryAfterDelay(error);
      const delay =
        retryAfterDelay !== null
          ? Math.min(retryAfterDelay, maxDelay)
          : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        { attempt: attempt + 1, maxAttempts: maxRetries + 1, delay, error: describeError(error), context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxRetries + 1})`
      );

      await sleep(delay);
    }
  }
}
