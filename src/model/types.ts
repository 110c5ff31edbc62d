/**
 * Model router types.
 *
 * Defines the abstract completion interface the agents call, so that the
 * subprocess backend can be swapped for a fake in tests.
 *
 * @packageDocumentation
 */

/**
 * Model alias used for routing requests.
 * Each alias maps to a model assignment in configuration.
 */
export type ModelAlias = 'planner' | 'observer' | 'interviewer' | 'expert' | 'reporter';

/**
 * Array of all valid model aliases.
 */
export const MODEL_ALIASES: readonly ModelAlias[] = [
  'planner',
  'observer',
  'interviewer',
  'expert',
  'reporter',
] as const;

/**
 * Checks if a string is a valid ModelAlias.
 *
 * @param value - The string to check.
 * @returns True if the value is a valid ModelAlias.
 */
export function isValidModelAlias(value: string): value is ModelAlias {
  return MODEL_ALIASES.some((alias) => alias === value);
}

/**
 * Request to the model router for completion.
 */
export interface ModelRouterRequest {
  /** Model alias to route the request to. */
  readonly modelAlias: ModelAlias;
  /** The user prompt. */
  readonly prompt: string;
  /** System prompt with the agent's role instructions. */
  readonly systemPrompt?: string | undefined;
  /** Per-request timeout overriding the client default. */
  readonly timeoutMs?: number | undefined;
  /** Correlation id echoed back in the response. */
  readonly requestId?: string | undefined;
}

/**
 * Token usage reported by the backend.
 */
export interface ModelUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/**
 * Metadata about the model that processed the request.
 */
export interface ModelMetadata {
  /** The model identifier reported by the backend. */
  readonly modelId: string;
  /** The backend that served the request. */
  readonly provider: string;
  readonly latencyMs: number;
}

/**
 * Successful completion.
 */
export interface ModelRouterResponse {
  readonly content: string;
  readonly usage: ModelUsage;
  readonly metadata: ModelMetadata;
  readonly requestId?: string | undefined;
}

/**
 * Discriminated union of model router error kinds.
 */
export type ModelRouterErrorKind =
  | 'RateLimitError'
  | 'AuthenticationError'
  | 'ModelError'
  | 'TimeoutError'
  | 'ProcessError'
  | 'ValidationError';

/**
 * Array of all valid error kinds.
 */
export const ERROR_KINDS: readonly ModelRouterErrorKind[] = [
  'RateLimitError',
  'AuthenticationError',
  'ModelError',
  'TimeoutError',
  'ProcessError',
  'ValidationError',
] as const;

/**
 * Fields shared by every model router error.
 */
export interface ModelRouterErrorBase {
  readonly kind: ModelRouterErrorKind;
  readonly message: string;
  readonly cause?: Error | undefined;
  readonly request?: ModelRouterRequest | undefined;
}

/**
 * Usage limit reached.
 */
export interface RateLimitError extends ModelRouterErrorBase {
  readonly kind: 'RateLimitError';
  /** Milliseconds to wait before retrying, when known. */
  readonly retryAfterMs?: number | undefined;
  readonly retryable: true;
}

/**
 * Credentials missing or rejected.
 */
export interface AuthenticationError extends ModelRouterErrorBase {
  readonly kind: 'AuthenticationError';
  readonly provider: string;
  readonly retryable: false;
}

/**
 * The backend ran but reported a failure.
 */
export interface ModelError extends ModelRouterErrorBase {
  readonly kind: 'ModelError';
  readonly errorCode?: string | undefined;
  readonly retryable: boolean;
}

/**
 * The request exceeded its timeout.
 */
export interface TimeoutError extends ModelRouterErrorBase {
  readonly kind: 'TimeoutError';
  readonly timeoutMs: number;
  readonly retryable: true;
}

/**
 * The backend process could not be started.
 */
export interface ProcessError extends ModelRouterErrorBase {
  readonly kind: 'ProcessError';
  readonly executable: string;
  readonly retryable: false;
}

/**
 * The request itself is invalid.
 */
export interface ValidationError extends ModelRouterErrorBase {
  readonly kind: 'ValidationError';
  readonly invalidFields?: readonly string[] | undefined;
  readonly retryable: false;
}

/**
 * Union type of all model router errors.
 */
export type ModelRouterError =
  | RateLimitError
  | AuthenticationError
  | ModelError
  | TimeoutError
  | ProcessError
  | ValidationError;

/**
 * Common options accepted by every error factory.
 */
interface ErrorContext {
  cause?: Error | undefined;
  request?: ModelRouterRequest | undefined;
}

// Only defined keys are copied so that exactOptionalPropertyTypes holds.
function contextFields(context: ErrorContext | undefined): ErrorContext {
  const fields: ErrorContext = {};
  if (context?.cause !== undefined) {
    fields.cause = context.cause;
  }
  if (context?.request !== undefined) {
    fields.request = context.request;
  }
  return fields;
}

/**
 * Checks whether an error may succeed on retry.
 */
export function isRetryableError(error: ModelRouterError): boolean {
  return error.retryable;
}

/**
 * Type guard to check if a value is a ModelRouterError.
 */
export function isModelRouterError(value: unknown): value is ModelRouterError {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const kind: unknown = Reflect.get(value, 'kind');
  const message: unknown = Reflect.get(value, 'message');
  return (
    typeof kind === 'string' &&
    ERROR_KINDS.some((known) => known === kind) &&
    typeof message === 'string'
  );
}

/**
 * Creates a RateLimitError.
 */
export function createRateLimitError(
  message: string,
  options?: ErrorContext & { retryAfterMs?: number | undefined }
): RateLimitError {
  const error: RateLimitError = {
    kind: 'RateLimitError',
    message,
    retryable: true,
    ...contextFields(options),
  };
  return options?.retryAfterMs !== undefined
    ? { ...error, retryAfterMs: options.retryAfterMs }
    : error;
}

/**
 * Creates an AuthenticationError.
 */
export function createAuthenticationError(
  message: string,
  provider: string,
  options?: ErrorContext
): AuthenticationError {
  return {
    kind: 'AuthenticationError',
    message,
    provider,
    retryable: false,
    ...contextFields(options),
  };
}

/**
 * Creates a ModelError.
 *
 * @param message - Error message.
 * @param retryable - Whether the error can be retried.
 * @param options - Error code and context.
 */
export function createModelError(
  message: string,
  retryable: boolean,
  options?: ErrorContext & { errorCode?: string | undefined }
): ModelError {
  const error: ModelError = {
    kind: 'ModelError',
    message,
    retryable,
    ...contextFields(options),
  };
  return options?.errorCode !== undefined ? { ...error, errorCode: options.errorCode } : error;
}

/**
 * Creates a TimeoutError.
 */
export function createTimeoutError(
  message: string,
  timeoutMs: number,
  options?: ErrorContext
): TimeoutError {
  return {
    kind: 'TimeoutError',
    message,
    timeoutMs,
    retryable: true,
    ...contextFields(options),
  };
}

/**
 * Creates a ProcessError.
 */
export function createProcessError(
  message: string,
  executable: string,
  options?: ErrorContext
): ProcessError {
  return {
    kind: 'ProcessError',
    message,
    executable,
    retryable: false,
    ...contextFields(options),
  };
}

/**
 * Creates a ValidationError.
 */
export function createValidationError(
  message: string,
  options?: ErrorContext & { invalidFields?: readonly string[] | undefined }
): ValidationError {
  const error: ValidationError = {
    kind: 'ValidationError',
    message,
    retryable: false,
    ...contextFields(options),
  };
  return options?.invalidFields !== undefined
    ? { ...error, invalidFields: options.invalidFields }
    : error;
}

/**
 * Result type for model router operations.
 */
export type ModelRouterResult =
  | { readonly success: true; readonly response: ModelRouterResponse }
  | { readonly success: false; readonly error: ModelRouterError };

/**
 * Creates a successful result.
 */
export function createSuccessResult(
  response: ModelRouterResponse
): Extract<ModelRouterResult, { success: true }> {
  return { success: true, response };
}

/**
 * Creates a failure result.
 */
export function createFailureResult(
  error: ModelRouterError
): Extract<ModelRouterResult, { success: false }> {
  return { success: false, error };
}

/**
 * Abstract interface for model completion.
 *
 * @remarks
 * Failures are returned as values, never thrown. Callers decide whether a
 * failure is fatal.
 */
export interface ModelRouter {
  /**
   * Sends a request and resolves with the completion or the failure.
   */
  complete(request: ModelRouterRequest): Promise<ModelRouterResult>;
}
