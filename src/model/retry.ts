/**
 * Retry logic with exponential backoff for model requests.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import type {
  ModelRouter,
  ModelRouterError,
  ModelRouterRequest,
  ModelRouterResult,
} from './types.js';
import { createFailureResult, createModelError, isRetryableError } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff. */
  baseDelayMs: number;
  /** Upper bound for a single delay in milliseconds. */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomizing delays. */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.2,
} as const;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Retry configuration with defaults applied.
 * @throws Error if a value is out of range.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = Math.max(DEFAULT_RETRY_CONFIG.maxDelayMs, baseDelayMs),
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
    throw new Error(`maxRetries must be a non-negative integer, got: ${String(maxRetries)}`);
  }

  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }

  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxRetries, baseDelayMs, maxDelayMs, jitterFactor };
}

/**
 * Calculates the delay before the next retry attempt.
 *
 * The delay is `min(maxDelayMs, baseDelayMs * 2^attempt) * (1 ± jitter)`. A
 * rate limit error carrying a retry hint uses the hint instead, capped at
 * maxDelayMs.
 *
 * @param attempt - The retry attempt number (0-indexed).
 * @param config - Retry configuration.
 * @param error - Error from the previous attempt.
 * @param random - Random function for jitter.
 * @returns Delay in milliseconds.
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig,
  error?: ModelRouterError,
  random: () => number = Math.random
): number {
  if (error?.kind === 'RateLimitError' && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;

  return Math.round(cappedDelay * jitterMultiplier);
}

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt about to run (1-indexed). */
  attempt: number;
  /** Total attempts that will be made (initial + retries). */
  totalAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** The error from the previous attempt. */
  previousError: ModelRouterError;
}

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  config?: Partial<RetryConfig> | undefined;
  /** Invoked before each retry. */
  onRetry?: ((info: RetryAttemptInfo) => void) | undefined;
  /** Sleep function for delays. */
  sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Random function for jitter. */
  random?: (() => number) | undefined;
}

/**
 * Default sleep implementation using setTimeout.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an operation, retrying retryable failures with exponential backoff.
 *
 * Non-retryable failures are returned at once. When every attempt fails, a
 * non-retryable ModelError with code RETRIES_EXHAUSTED is returned.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => client.complete(request), {
 *   config: { maxRetries: 2, baseDelayMs: 500 },
 * });
 * ```
 */
export async function withRetry(
  operation: () => Promise<ModelRouterResult>,
  options: WithRetryOptions = {}
): Promise<ModelRouterResult> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const totalAttempts = config.maxRetries + 1;

  let lastError: ModelRouterError | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (lastError !== undefined) {
      const delayMs = calculateBackoffDelay(attempt - 1, config, lastError, random);
      options.onRetry?.({
        attempt: attempt + 1,
        totalAttempts,
        delayMs,
        previousError: lastError,
      });
      await sleep(delayMs);
    }

    const result = await operation();

    if (result.success || !isRetryableError(result.error)) {
      return result;
    }

    lastError = result.error;
  }

  const finalMessage =
    lastError === undefined
      ? 'No attempt was made'
      : `All ${String(totalAttempts)} attempts failed. Last error: ${lastError.message}`;

  return createFailureResult(
    createModelError(finalMessage, false, {
      errorCode: 'RETRIES_EXHAUSTED',
      cause: lastError?.cause,
      request: lastError?.request,
    })
  );
}

/**
 * Wraps a router so that every request is retried with backoff.
 *
 * @param router - Router to wrap.
 * @param options - Retry options; retries are logged as warnings when a logger is given.
 */
export function createRetryingRouter(
  router: ModelRouter,
  options: WithRetryOptions & { logger?: Logger | undefined } = {}
): ModelRouter {
  const { logger, ...retryOptions } = options;
  return {
    complete: (request: ModelRouterRequest) =>
      withRetry(() => router.complete(request), {
        ...retryOptions,
        onRetry: (info) => {
          logger?.warn('model_request_retry', {
            modelAlias: request.modelAlias,
            attempt: info.attempt,
            totalAttempts: info.totalAttempts,
            delayMs: info.delayMs,
            errorKind: info.previousError.kind,
          });
          retryOptions.onRetry?.(info);
        },
      }),
  };
}
