/**
 * Model routing: request types, the `claude` CLI backend and retry handling.
 *
 * @packageDocumentation
 */

export type {
  AuthenticationError,
  ModelAlias,
  ModelError,
  ModelMetadata,
  ModelRouter,
  ModelRouterError,
  ModelRouterErrorKind,
  ModelRouterRequest,
  ModelRouterResponse,
  ModelRouterResult,
  ModelUsage,
  ProcessError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from './types.js';
export {
  ERROR_KINDS,
  MODEL_ALIASES,
  createAuthenticationError,
  createFailureResult,
  createModelError,
  createProcessError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
  createValidationError,
  isModelRouterError,
  isRetryableError,
  isValidModelAlias,
} from './types.js';
export {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  createRetryingRouter,
  defaultSleep,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type { RetryAttemptInfo, RetryConfig, WithRetryOptions } from './retry.js';
export {
  CLAUDE_CODE_PROVIDER,
  ClaudeCodeClient,
  parseClaudeOutput,
  resolveModelAlias,
} from './claude-code-client.js';
export type { ClaudeCodeClientOptions, ParsedClaudeOutput } from './claude-code-client.js';
