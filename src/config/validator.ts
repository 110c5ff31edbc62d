/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser cannot: ranges, threshold ordering, non-empty lists
 * and, optionally, that configured directories exist.
 *
 * @packageDocumentation
 */

import type { Config, InterviewSettings, ModelClientConfig, ThresholdConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  exists: boolean;
  isDirectory?: boolean | undefined;
  errorMessage?: string | undefined;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string, isDirectory: boolean) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Checks that configured directories exist. Skipped when absent.
   */
  pathChecker?: PathChecker | undefined;
}

function validateRange(
  value: number,
  fieldPath: string,
  min: number,
  max: number,
  errors: ValidationError[]
): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be between ${String(min)} and ${String(max)}, got ${String(value)}`,
    });
  }
}

function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateModels(config: Config, errors: ValidationError[]): void {
  for (const [field, model] of Object.entries(config.models)) {
    if (model.trim() === '') {
      errors.push({
        field: `models.${field}`,
        value: model,
        message: `'models.${field}' must not be empty`,
      });
    }
  }
}

function validateInterview(settings: InterviewSettings, errors: ValidationError[]): void {
  if (!Number.isInteger(settings.initial_difficulty)) {
    errors.push({
      field: 'interview.initial_difficulty',
      value: settings.initial_difficulty,
      message: `'interview.initial_difficulty' must be an integer, got ${String(settings.initial_difficulty)}`,
    });
  }
  validateRange(settings.initial_difficulty, 'interview.initial_difficulty', 1, 5, errors);
  validatePositiveInteger(settings.max_question_chars, 'interview.max_question_chars', errors);
  validatePositiveInteger(settings.recent_turns_window, 'interview.recent_turns_window', errors);
  validatePositiveInteger(settings.max_turns, 'interview.max_turns', errors);

  if (settings.stop_commands.every((command) => command.trim() === '')) {
    errors.push({
      field: 'interview.stop_commands',
      value: settings.stop_commands,
      message: `'interview.stop_commands' must contain at least one non-empty phrase`,
    });
  }

  if (settings.skill_vocabulary.length === 0) {
    errors.push({
      field: 'interview.skill_vocabulary',
      value: settings.skill_vocabulary,
      message: `'interview.skill_vocabulary' must not be empty`,
    });
  }
}

function validateThresholds(thresholds: ThresholdConfig, errors: ValidationError[]): void {
  validateRange(thresholds.confirmed_skill, 'thresholds.confirmed_skill', 0, 1, errors);
  validateRange(thresholds.gap_skill, 'thresholds.gap_skill', 0, 1, errors);
  validateRange(thresholds.initial_skill_score, 'thresholds.initial_skill_score', 0, 1, errors);
  validateRange(
    thresholds.raise_difficulty_quality,
    'thresholds.raise_difficulty_quality',
    0,
    5,
    errors
  );
  validateRange(
    thresholds.lower_difficulty_quality,
    'thresholds.lower_difficulty_quality',
    0,
    5,
    errors
  );

  if (thresholds.gap_skill >= thresholds.confirmed_skill) {
    errors.push({
      field: 'thresholds.gap_skill',
      value: thresholds.gap_skill,
      message: `'thresholds.gap_skill' must be less than 'thresholds.confirmed_skill' (${String(thresholds.confirmed_skill)})`,
    });
  }

  if (thresholds.lower_difficulty_quality >= thresholds.raise_difficulty_quality) {
    errors.push({
      field: 'thresholds.lower_difficulty_quality',
      value: thresholds.lower_difficulty_quality,
      message: `'thresholds.lower_difficulty_quality' must be less than 'thresholds.raise_difficulty_quality' (${String(thresholds.raise_difficulty_quality)})`,
    });
  }
}

function validateModelClient(client: ModelClientConfig, errors: ValidationError[]): void {
  if (client.executable.trim() === '') {
    errors.push({
      field: 'model_client.executable',
      value: client.executable,
      message: `'model_client.executable' must not be empty`,
    });
  }
  validatePositiveInteger(client.timeout_ms, 'model_client.timeout_ms', errors);
  if (!Number.isInteger(client.max_retry_attempts) || client.max_retry_attempts < 0) {
    errors.push({
      field: 'model_client.max_retry_attempts',
      value: client.max_retry_attempts,
      message: `'model_client.max_retry_attempts' must be a non-negative integer, got ${String(client.max_retry_attempts)}`,
    });
  }
  validatePositiveInteger(client.retry_base_delay_ms, 'model_client.retry_base_delay_ms', errors);
}

function validatePaths(config: Config, errors: ValidationError[], pathChecker: PathChecker): void {
  if (config.paths.prompts === '') {
    return;
  }
  const result = pathChecker(config.paths.prompts, true);
  if (!result.exists) {
    errors.push({
      field: 'paths.prompts',
      value: config.paths.prompts,
      message: result.errorMessage ?? `Path does not exist: '${config.paths.prompts}'`,
    });
  } else if (result.isDirectory === false) {
    errors.push({
      field: 'paths.prompts',
      value: config.paths.prompts,
      message: `Path exists but is not a directory: '${config.paths.prompts}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @returns Validation result with every error found.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * for (const error of result.errors) {
 *   console.error(`${error.field}: ${error.message}`);
 * }
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const errors: ValidationError[] = [];

  validateModels(config, errors);
  validateInterview(config.interview, errors);
  validateThresholds(config.thresholds, errors);
  validateModelClient(config.model_client, errors);

  if (options.pathChecker !== undefined) {
    validatePaths(config, errors, options.pathChecker);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError listing every failed field.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
