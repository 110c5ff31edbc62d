/**
 * interview-coach
 *
 * Adaptive technical interviews driven by cooperating model agents: a
 * planner, an observer, topic experts, an interviewer and a report writer.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './interview/index.js';

export {
  createModelCollaborators,
  AgentError,
  PromptLoader,
  PromptLoadError,
  DEFAULT_PROMPTS_DIR,
} from './agents/index.js';
export type { AgentName, ModelAgentOptions } from './agents/index.js';

export {
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  getDefaultConfig,
  loadConfig,
  readDebugFlag,
} from './config/index.js';
export type { Config, LoadConfigOptions, PartialConfig } from './config/index.js';

export { ClaudeCodeClient, MODEL_ALIASES, createRetryingRouter } from './model/index.js';
export type {
  ModelAlias,
  ModelRouter,
  ModelRouterRequest,
  ModelRouterResult,
  RetryConfig,
} from './model/index.js';

export {
  ReportStorageError,
  loadFinalFeedback,
  reportPathForLog,
  saveFinalFeedback,
} from './report/storage.js';
export type { ReportFormat } from './report/storage.js';

export { Logger, silentLogger } from './utils/logger.js';
export type { LogLevel, LogSink, LoggerOptions } from './utils/logger.js';
