/**
 * Configuration module for interview.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  ExpertDispatchMode,
  InterviewSettings,
  ModelAssignments,
  ModelClientConfig,
  PartialConfig,
  PathConfig,
  ThresholdConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_INTERVIEW_SETTINGS,
  DEFAULT_MODEL_ASSIGNMENTS,
  DEFAULT_MODEL_CLIENT,
  DEFAULT_PATHS,
  DEFAULT_SKILL_VOCABULARY,
  DEFAULT_STOP_COMMANDS,
  DEFAULT_THRESHOLDS,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateConfigOptions,
} from './validator.js';
export {
  DEBUG_ENV_VAR,
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  readDebugFlag,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { DEFAULT_CONFIG_FILE, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
