/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient failures (HTTP 429/5xx, dropped connections) with
 * exponential backoff, honouring Retry-After when the server sends one.
 */

import { isAxiosError } from 'axios';
import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first one (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED', 'EAI_AGAIN']);

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Default retryable error detection
 */
export function isRetryableError(error: unknown): boolean {
  if (isAxiosError(error)) {
    if (error.response) {
      return isRetryableStatus(error.response.status);
    }
    // No response at all: network failure or timeout
    return true;
  }

  if (error && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.has(code)) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
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
 * Extract Retry-After header value (seconds form) from an axios error response
 *
 * @returns Retry-After value in milliseconds, or null if not present
 */
function getRetryAfterDelay(error: unknown): number | null {
  if (!isAxiosError(error) || !error.response) {
    return null;
  }

  const retryAfter: unknown = error.response.headers['retry-after'];
  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }

  const seconds = parseInt(String(value), 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  return null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param context - Optional context for logging (e.g. operation name, URL)
 * @throws The last error if all retries are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryableError,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const retryAfterDelay = getRetryAfterDelay(error);
      const delay = retryAfterDelay !== null
        ? Math.min(retryAfterDelay, maxDelay)
        : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
