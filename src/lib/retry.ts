// Retry wrapper for Google API calls
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { TransientIOError, errorMessage } from './errors.js';

const TRANSIENT_HTTP_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ESOCKETTIMEDOUT',
]);

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * HTTP status of a gaxios/googleapis error, if it carries one.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
}

/**
 * Check if error is retryable (network, rate limit, server errors)
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientIOError) {
    return true;
  }

  const status = httpStatusOf(error);
  if (status !== undefined) {
    return TRANSIENT_HTTP_STATUS.has(status);
  }

  if (!error || typeof error !== 'object') {
    return false;
  }

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }

  const message = errorMessage(error).toLowerCase();
  return message.includes('timed out') || message.includes('temporarily unavailable');
}

/**
 * Runs `operation`, retrying transient failures with exponential backoff
 * (1s, 2s, 4s, capped at maxDelayMs). Non-transient errors are rethrown as-is;
 * a transient error that survives every attempt becomes a TransientIOError.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  name: string,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 4;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 8000;
  const logger = options.logger ?? silentLogger;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }

      if (attempt >= attempts) {
        throw new TransientIOError(name, errorMessage(error), { cause: error });
      }

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      logger.warn(
        { operation: name, attempt, attempts, delayMs: delay, err: errorMessage(error) },
        'Transient Google API error, retrying'
      );
      await sleep(delay);
    }
  }
}
